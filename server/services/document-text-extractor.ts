/**
 * Document Text Extractor
 *
 * Zet een geüpload bestand om in platte tekst plus tabeldata voor de AI extractie.
 * PDF via pdf-parse (tekst en tabellen), CSV/XLS/XLSX via SheetJS.
 */

import path from "node:path";
import { PDFParse } from "pdf-parse";
import * as XLSX from "xlsx";
import { FILE_UPLOAD } from "../config/constants";
import { ServerError, getErrorMessage } from "../middleware/errorHandler";
import { logger } from "./logger";

export type DocumentKind = typeof FILE_UPLOAD.ALLOWED_EXTENSIONS[number];

export interface ExtractedDocument {
  kind: DocumentKind;
  text: string;
  tables: string;
}

export function detectDocumentKind(filename: string): DocumentKind | null {
  const extension = path.extname(filename).slice(1).toLowerCase();
  return FILE_UPLOAD.ALLOWED_EXTENSIONS.find(allowed => allowed === extension) ?? null;
}

/**
 * Tabellen als CSV-achtige regels, één lege regel tussen tabellen.
 */
export function renderTables(tables: string[][][]): string {
  return tables
    .map(rows => rows.map(row => row.join(',')).join('\n'))
    .filter(table => table.trim())
    .join('\n\n');
}

async function extractPdfContent(buffer: Buffer): Promise<{ text: string; tables: string }> {
  const parser = new PDFParse({ data: buffer });
  try {
    const textResult = await parser.getText();
    const tableResult = await parser.getTable();
    const tables = tableResult.pages.flatMap(page => page.tables);
    return { text: textResult.text, tables: renderTables(tables) };
  } catch (error) {
    throw ServerError.unreadableDocument(getErrorMessage(error));
  } finally {
    await parser.destroy();
  }
}

/**
 * Elk werkblad als CSV, met de naam van het blad erboven.
 */
export function spreadsheetToText(buffer: Buffer): string {
  let workbook: XLSX.WorkBook;
  try {
    workbook = XLSX.read(buffer, { type: "buffer" });
  } catch (error) {
    throw ServerError.unreadableDocument(getErrorMessage(error));
  }

  return workbook.SheetNames
    .map(name => {
      const sheet = workbook.Sheets[name];
      const csv = sheet ? XLSX.utils.sheet_to_csv(sheet) : '';
      // Lege bladen overslaan
      return csv.trim() ? `Sheet: ${name}\n${csv}` : '';
    })
    .filter(Boolean)
    .join('\n\n');
}

export async function extractDocumentText(buffer: Buffer, filename: string): Promise<ExtractedDocument> {
  const kind = detectDocumentKind(filename);
  if (!kind) {
    throw ServerError.unsupportedFile(filename);
  }

  let document: ExtractedDocument;
  if (kind === 'pdf') {
    document = { kind, ...(await extractPdfContent(buffer)) };
  } else {
    // Spreadsheets zijn al tabellen; dezelfde tekst gaat mee als tabeldata
    const text = spreadsheetToText(buffer);
    document = { kind, text, tables: text };
  }

  if (!document.text.trim() && !document.tables.trim()) {
    throw ServerError.unreadableDocument('No text could be extracted from the document');
  }

  logger.info('document-text-extractor', `📄 Extracted ${document.text.length} chars from ${kind}`, { filename });
  return document;
}
