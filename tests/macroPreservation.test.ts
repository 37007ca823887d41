import { describe, expect, it } from 'vitest';
import JSZip from 'jszip';

import {
  preserveVbaProject,
  registerVbaContentTypes,
  registerVbaRelationship
} from '../engine/macroPreservation';
import { SAMPLE_ROWS, buildXlsx, withVbaProject } from './helpers/workbooks';

const CONTENT_TYPES =
  '<?xml version="1.0" encoding="UTF-8"?>' +
  '<Types xmlns="http://schemas.openxmlformats.org/package/2006/content-types">' +
  '<Default Extension="xml" ContentType="application/xml"/>' +
  '<Override PartName="/xl/workbook.xml" ContentType="application/vnd.openxmlformats-officedocument.spreadsheetml.sheet.main+xml"/>' +
  '</Types>';

const RELS =
  '<Relationships xmlns="http://schemas.openxmlformats.org/package/2006/relationships">' +
  '<Relationship Id="rId1" Type="http://schemas.openxmlformats.org/officeDocument/2006/relationships/worksheet" Target="worksheets/sheet1.xml"/>' +
  '</Relationships>';

async function partText(bytes: Buffer, path: string): Promise<string | undefined> {
  const zip = await JSZip.loadAsync(bytes);
  return zip.file(path)?.async('string');
}

describe('registerVbaContentTypes', () => {
  it('marks the workbook as macro-enabled and registers .bin parts', () => {
    expect(registerVbaContentTypes(CONTENT_TYPES)).toBe(
      '<?xml version="1.0" encoding="UTF-8"?>' +
        '<Types xmlns="http://schemas.openxmlformats.org/package/2006/content-types">' +
        '<Default Extension="bin" ContentType="application/vnd.ms-office.vbaProject"/>' +
        '<Default Extension="xml" ContentType="application/xml"/>' +
        '<Override PartName="/xl/workbook.xml" ContentType="application/vnd.ms-excel.sheet.macroEnabled.main+xml"/>' +
        '</Types>'
    );
  });

  it('does not register .bin twice', () => {
    const once = registerVbaContentTypes(CONTENT_TYPES);
    expect(registerVbaContentTypes(once)).toBe(once);
  });
});

describe('registerVbaRelationship', () => {
  it('adds a vbaProject relationship with a free id', () => {
    expect(registerVbaRelationship(RELS)).toBe(
      RELS.replace(
        '</Relationships>',
        '<Relationship Id="rIdVba1" Type="http://schemas.microsoft.com/office/2006/relationships/vbaProject" Target="vbaProject.bin"/></Relationships>'
      )
    );
  });

  it('leaves relationships that already reference a VBA project', () => {
    const once = registerVbaRelationship(RELS);
    expect(registerVbaRelationship(once)).toBe(once);
  });
});

describe('preserveVbaProject', () => {
  it('copies the VBA project of the source into the output', async () => {
    const source = await withVbaProject(await buildXlsx([{ name: 'Data', rows: SAMPLE_ROWS }]), 'fake-vba');
    const output = await buildXlsx([{ name: 'Data', rows: SAMPLE_ROWS }]);

    const result = await preserveVbaProject(source, output);

    expect(await partText(result, 'xl/vbaProject.bin')).toBe('fake-vba');
    expect(await partText(result, '[Content_Types].xml')).toContain(
      'ContentType="application/vnd.ms-excel.sheet.macroEnabled.main+xml"'
    );
    expect(await partText(result, 'xl/_rels/workbook.xml.rels')).toContain('Target="vbaProject.bin"');
  });

  it('returns the output untouched when the source has no VBA project', async () => {
    const source = await buildXlsx([{ name: 'Data', rows: SAMPLE_ROWS }]);
    const output = await buildXlsx([{ name: 'Data', rows: SAMPLE_ROWS }]);

    expect(await preserveVbaProject(source, output)).toBe(output);
  });
});
