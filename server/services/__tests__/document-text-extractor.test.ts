import { describe, it, expect, vi, beforeEach } from 'vitest';
import * as XLSX from 'xlsx';
import { detectDocumentKind, extractDocumentText, renderTables } from '../document-text-extractor';
import { buildExtractionInput } from '../vpb-extraction';
import { ServerError } from '../../middleware/errorHandler';
import { ERROR_CODES } from '@shared/errors';

// pdf-parse vervangen door een parser die vaste tekst en tabellen teruggeeft
const pdf = vi.hoisted(() => ({
  text: '',
  pages: [] as Array<{ num: number; tables: string[][][] }>,
  destroyed: 0,
}));

vi.mock('pdf-parse', () => ({
  PDFParse: class {
    async getText() {
      return { text: pdf.text };
    }
    async getTable() {
      return { pages: pdf.pages };
    }
    async destroy() {
      pdf.destroyed++;
    }
  },
}));

beforeEach(() => {
  pdf.text = '';
  pdf.pages = [];
  pdf.destroyed = 0;
});

describe('renderTables', () => {
  it('renders rows as comma separated lines with a blank line between tables', () => {
    expect(renderTables([
      [['Kwartaal', 'Omzet'], ['Q1', '100000']],
      [['Verlies', '40000']],
    ])).toBe('Kwartaal,Omzet\nQ1,100000\n\nVerlies,40000');
  });

  it('skips empty tables', () => {
    expect(renderTables([[], [['A', 'B']]])).toBe('A,B');
  });
});

describe('detectDocumentKind', () => {
  it('recognises supported extensions case-insensitively', () => {
    expect(detectDocumentKind('jaarrekening.pdf')).toBe('pdf');
    expect(detectDocumentKind('Cijfers 2024.XLSX')).toBe('xlsx');
    expect(detectDocumentKind('export.csv')).toBe('csv');
  });

  it('returns null for anything else', () => {
    expect(detectDocumentKind('notes.docx')).toBeNull();
    expect(detectDocumentKind('no-extension')).toBeNull();
  });
});

describe('extractDocumentText', () => {
  it('renders a CSV file as sheet text and table data', async () => {
    const buffer = Buffer.from('Kwartaal,Omzet\nQ1,100000\nQ2,80000\n');
    const document = await extractDocumentText(buffer, 'export.csv');

    expect(document.kind).toBe('csv');
    expect(document.text.startsWith('Sheet: Sheet1\nKwartaal,Omzet\n')).toBe(true);
    expect(document.text).toContain('Q2,80000');
    expect(document.tables).toBe(document.text);
  });

  it('renders every sheet of a workbook', async () => {
    const workbook = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet([['Omzet', 250000]]), 'Resultaten');
    XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet([['Verlies', 40000]]), 'Fiscaal');
    const buffer: Buffer = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });

    const document = await extractDocumentText(buffer, 'cijfers.xlsx');

    expect(document.kind).toBe('xlsx');
    expect(document.text).toContain('Sheet: Resultaten\nOmzet,250000');
    expect(document.text).toContain('Sheet: Fiscaal\nVerlies,40000');
  });

  it('reads text and every table of a PDF', async () => {
    pdf.text = 'Jaarrekening 2024';
    pdf.pages = [
      { num: 1, tables: [[['Kwartaal', 'Omzet'], ['Q1', '100000'], ['Q2', '80000']]] },
      { num: 2, tables: [[['Compensabele verliezen', '40000']]] },
    ];

    const document = await extractDocumentText(Buffer.from('%PDF-1.4'), 'jaarrekening.pdf');

    expect(document).toEqual({
      kind: 'pdf',
      text: 'Jaarrekening 2024',
      tables: 'Kwartaal,Omzet\nQ1,100000\nQ2,80000\n\nCompensabele verliezen,40000',
    });
    expect(pdf.destroyed).toBe(1);
    expect(buildExtractionInput(document.text, document.tables, 10_000)).toBe(
      'DOCUMENT TEXT:\nJaarrekening 2024\n\nTABLES DATA:\nKwartaal,Omzet\nQ1,100000\nQ2,80000\n\nCompensabele verliezen,40000'
    );
  });

  it('accepts a PDF that only has tables', async () => {
    pdf.pages = [{ num: 1, tables: [[['Omzet', '250000']]] }];

    const document = await extractDocumentText(Buffer.from('%PDF-1.4'), 'scan.pdf');

    expect(document.text).toBe('');
    expect(document.tables).toBe('Omzet,250000');
  });

  it('rejects a PDF without text or tables', async () => {
    await expect(extractDocumentText(Buffer.from('%PDF-1.4'), 'leeg.pdf')).rejects.toMatchObject({
      code: ERROR_CODES.DOCUMENT_UNREADABLE,
    });
    expect(pdf.destroyed).toBe(1);
  });

  it('rejects unsupported file types with 415', async () => {
    await expect(extractDocumentText(Buffer.from('x'), 'brief.docx')).rejects.toMatchObject({
      code: ERROR_CODES.UNSUPPORTED_FILE_TYPE,
      statusCode: 415,
    });
  });

  it('rejects a document without text', async () => {
    const error = await extractDocumentText(Buffer.from('   '), 'leeg.csv').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ServerError);
    expect(error).toMatchObject({ code: ERROR_CODES.DOCUMENT_UNREADABLE, statusCode: 400 });
  });
});
