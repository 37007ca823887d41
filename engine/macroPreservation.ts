// engine/macroPreservation.ts
// Carry the VBA project of an .xlsm source into the workbook exceljs wrote.

import JSZip from 'jszip';

const VBA_PART = 'xl/vbaProject.bin';
const CONTENT_TYPES_PART = '[Content_Types].xml';
const WORKBOOK_RELS_PART = 'xl/_rels/workbook.xml.rels';

const VBA_CONTENT_TYPE = 'application/vnd.ms-office.vbaProject';
const WORKBOOK_CONTENT_TYPE = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet.main+xml';
const MACRO_WORKBOOK_CONTENT_TYPE = 'application/vnd.ms-excel.sheet.macroEnabled.main+xml';
const VBA_RELATIONSHIP_TYPE = 'http://schemas.microsoft.com/office/2006/relationships/vbaProject';

async function readText(zip: JSZip, path: string): Promise<string> {
  const entry = zip.file(path);
  if (!entry) {
    throw new Error(`Package part ${path} is missing from the written workbook.`);
  }
  return entry.async('string');
}

export function registerVbaContentTypes(xml: string): string {
  let out = xml.replace(WORKBOOK_CONTENT_TYPE, MACRO_WORKBOOK_CONTENT_TYPE);
  if (!/<Default\s+Extension="bin"/.test(out)) {
    out = out.replace(
      /<Types\b[^>]*>/,
      (open) => `${open}<Default Extension="bin" ContentType="${VBA_CONTENT_TYPE}"/>`
    );
  }
  return out;
}

export function registerVbaRelationship(xml: string): string {
  if (xml.includes(VBA_RELATIONSHIP_TYPE)) return xml;

  const usedIds = new Set([...xml.matchAll(/Id="([^"]+)"/g)].map((m) => m[1]));
  let n = 1;
  while (usedIds.has(`rIdVba${n}`)) n++;

  return xml.replace(
    '</Relationships>',
    `<Relationship Id="rIdVba${n}" Type="${VBA_RELATIONSHIP_TYPE}" Target="vbaProject.bin"/></Relationships>`
  );
}

/**
 * Returns `output` with the source's vbaProject.bin re-attached.
 * A source without a VBA part yields `output` unchanged.
 */
export async function preserveVbaProject(source: Buffer, output: Buffer): Promise<Buffer> {
  const sourceZip = await JSZip.loadAsync(source);
  const vba = sourceZip.file(VBA_PART);
  if (!vba) return output;

  const outputZip = await JSZip.loadAsync(output);
  outputZip.file(VBA_PART, await vba.async('nodebuffer'));
  outputZip.file(
    CONTENT_TYPES_PART,
    registerVbaContentTypes(await readText(outputZip, CONTENT_TYPES_PART))
  );
  outputZip.file(
    WORKBOOK_RELS_PART,
    registerVbaRelationship(await readText(outputZip, WORKBOOK_RELS_PART))
  );

  return outputZip.generateAsync({ type: 'nodebuffer', compression: 'DEFLATE' });
}
