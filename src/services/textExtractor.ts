import mammoth from 'mammoth';
import WordExtractor from 'word-extractor';
import * as XLSX from 'xlsx';
import { ExtractionFailedError, errorMessage } from '../errors/appErrors';
import { logger } from '../utilities/logger';
import type { SupportedExtension } from './fileValidator';

export interface ExtractionSource {
  fileName: string;
  extension: SupportedExtension;
}

type Reader = (bytes: Buffer) => Promise<string>;

const utf8 = new TextDecoder('utf-8', { fatal: true });

const PDF_SIGNATURE = Buffer.from('%PDF');
// xlsx and docx are zip containers, xls and doc are OLE compound files
const ZIP_SIGNATURE = Buffer.from([0x50, 0x4b, 0x03, 0x04]);
const OLE_SIGNATURE = Buffer.from([0xd0, 0xcf, 0x11, 0xe0, 0xa1, 0xb1, 0x1a, 0xe1]);

function assertSignature(bytes: Buffer, signature: Buffer, format: string): void {
  if (!bytes.subarray(0, signature.length).equals(signature)) {
    throw new Error(`File content does not match ${format} signature`);
  }
}

async function readPdf(bytes: Buffer): Promise<string> {
  assertSignature(bytes, PDF_SIGNATURE, 'PDF');
  const { default: pdfParse } = await import('pdf-parse');
  const data = await pdfParse(bytes);
  return data.text;
}

async function readDocx(bytes: Buffer): Promise<string> {
  assertSignature(bytes, ZIP_SIGNATURE, 'DOCX');
  const result = await mammoth.extractRawText({ buffer: bytes });
  return result.value;
}

async function readDoc(bytes: Buffer): Promise<string> {
  assertSignature(bytes, OLE_SIGNATURE, 'DOC');
  const extracted = await new WordExtractor().extract(bytes);
  return extracted.getBody();
}

async function readXlsx(bytes: Buffer): Promise<string> {
  assertSignature(bytes, ZIP_SIGNATURE, 'XLSX');
  return readWorkbook(bytes);
}

async function readXls(bytes: Buffer): Promise<string> {
  assertSignature(bytes, OLE_SIGNATURE, 'XLS');
  return readWorkbook(bytes);
}

// XLSX.read falls back to parsing unknown bytes as CSV, so callers check the container first
function readWorkbook(bytes: Buffer): string {
  const workbook = XLSX.read(bytes, { type: 'buffer' });
  return workbook.SheetNames.map((name) => {
    const csv = XLSX.utils.sheet_to_csv(workbook.Sheets[name], { blankrows: false });
    return `## ${name}\n${csv}`;
  }).join('\n\n');
}

async function readPlainText(bytes: Buffer): Promise<string> {
  return utf8.decode(bytes);
}

const READERS: Record<SupportedExtension, Reader> = {
  pdf: readPdf,
  doc: readDoc,
  docx: readDocx,
  xls: readXls,
  xlsx: readXlsx,
  txt: readPlainText,
  md: readPlainText,
};

/**
 * Converts an uploaded document into plain text.
 * Any reader failure, including a document with no text at all, surfaces as
 * ExtractionFailedError.
 */
export async function extractText(source: ExtractionSource, bytes: Buffer): Promise<string> {
  let text: string;
  try {
    text = await READERS[source.extension](bytes);
  } catch (err) {
    logger.warn(`Text extraction failed for ${source.fileName}: ${errorMessage(err)}`);
    throw new ExtractionFailedError(source.fileName, errorMessage(err));
  }
  if (!text.trim()) {
    throw new ExtractionFailedError(source.fileName, 'document contains no extractable text');
  }
  return text;
}
