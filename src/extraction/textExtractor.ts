/* src/extraction/textExtractor.ts
   Binary document → plain text.

   txt/md are read as UTF-8; json is re-serialized with 2-space indent; csv
   becomes "Headers: ..." and "Row N: a | b" lines; pdf goes through
   pdf-parse, docx through mammoth; xlsx and zip are opened with jszip
   (zip entries are extracted in memory, recursively). */
import { promises as fs } from 'node:fs';
import path from 'node:path';
import JSZip from 'jszip';
import mammoth from 'mammoth';
import { createLogger } from '../observability/logger';
import { UnsupportedFileType, errorMessage } from '../knowledge/errors';

const log = createLogger('extraction');

export interface TextExtractor {
  /** Throws on unreadable input; may return blank text. */
  extract(filePath: string): Promise<string>;
}

type Extractor = (buf: Buffer, name: string, depth: number) => Promise<string>;

const MAX_ARCHIVE_DEPTH = 3;

/* ---------------- helpers ---------------- */

function xmlDecode(s: string): string {
  return s
    .replace(/&#(\d+);/g, (_m, d: string) => String.fromCodePoint(Number(d)))
    .replace(/&#x([0-9a-f]+);/gi, (_m, h: string) => String.fromCodePoint(parseInt(h, 16)))
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&apos;/g, "'")
    .replace(/&amp;/g, '&');
}

function allMatches(re: RegExp, s: string): RegExpExecArray[] {
  const out: RegExpExecArray[] = [];
  let m: RegExpExecArray | null;
  while ((m = re.exec(s))) out.push(m);
  return out;
}

/**
 * RFC 4180-style CSV rows. Blank lines yield empty rows, as the row
 * numbering in the output counts them.
 */
export function parseCsvRows(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let cell = '';
  let inQuotes = false;
  let rowHasContent = false;

  const endRow = () => {
    if (rowHasContent || cell !== '') row.push(cell);
    rows.push(row);
    row = [];
    cell = '';
    rowHasContent = false;
  };

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (inQuotes) {
      if (ch === '"' && text[i + 1] === '"') {
        cell += '"';
        i++;
      } else if (ch === '"') {
        inQuotes = false;
      } else {
        cell += ch;
      }
      continue;
    }
    if (ch === '"') {
      inQuotes = true;
      rowHasContent = true;
    } else if (ch === ',') {
      row.push(cell);
      cell = '';
      rowHasContent = true;
    } else if (ch === '\n' || ch === '\r') {
      if (ch === '\r' && text[i + 1] === '\n') i++;
      endRow();
    } else {
      cell += ch;
    }
  }
  if (rowHasContent || cell !== '') endRow();
  return rows;
}

export function csvToText(text: string): string {
  const lines: string[] = [];
  parseCsvRows(text).forEach((row, i) => {
    if (i === 0) {
      lines.push(`Headers: ${row.join(', ')}`);
      return;
    }
    const rowText = row.join(' | ');
    if (rowText.trim()) lines.push(`Row ${i}: ${rowText}`);
  });
  return lines.join('\n');
}

/* ---------------- per-format extractors ---------------- */

const extractPlain: Extractor = async (buf) => buf.toString('utf8');

const extractJson: Extractor = async (buf) =>
  JSON.stringify(JSON.parse(buf.toString('utf8')), null, 2);

const extractCsv: Extractor = async (buf) => csvToText(buf.toString('utf8'));

const extractPdf: Extractor = async (buf) => {
  // Loaded lazily: the module runs a self-test when required at top level.
  const { default: pdfParse } = await import('pdf-parse');
  const parsed = await pdfParse(buf);
  return parsed.text ?? '';
};

const extractDocx: Extractor = async (buf) => {
  const { value } = await mammoth.extractRawText({ buffer: buf });
  return value;
};

async function readZipText(zip: JSZip, name: string): Promise<string | null> {
  const entry = zip.file(name);
  return entry ? entry.async('string') : null;
}

export const extractXlsx: Extractor = async (buf) => {
  const zip = await JSZip.loadAsync(buf);

  const sst = await readZipText(zip, 'xl/sharedStrings.xml');
  const shared = sst
    ? allMatches(/<si>([\s\S]*?)<\/si>/g, sst).map((m) =>
        allMatches(/<t[^>]*>([\s\S]*?)<\/t>/g, m[1]).map((t) => xmlDecode(t[1])).join('')
      )
    : [];

  const workbook = await readZipText(zip, 'xl/workbook.xml');
  const titles = workbook
    ? allMatches(/<sheet\b[^>]*\bname="([^"]*)"/g, workbook).map((m) => xmlDecode(m[1]))
    : [];

  const sheetFiles = Object.keys(zip.files)
    .filter((n) => /^xl\/worksheets\/sheet\d+\.xml$/.test(n))
    .sort((a, b) => Number(a.replace(/\D/g, '')) - Number(b.replace(/\D/g, '')));

  const out: string[] = [];
  for (const [i, file] of sheetFiles.entries()) {
    const xml = await readZipText(zip, file);
    if (xml === null) continue;
    out.push(`Sheet: ${titles[i] ?? path.basename(file, '.xml')}`);

    for (const row of allMatches(/<row\b[^>]*>([\s\S]*?)<\/row>/g, xml)) {
      const cells = allMatches(/<c\b([^>]*?)(?:\/>|>([\s\S]*?)<\/c>)/g, row[1]).map((c) => {
        const attrs = c[1];
        const body = c[2] ?? '';
        if (/\bt="s"/.test(attrs)) {
          const v = /<v>([\s\S]*?)<\/v>/.exec(body);
          return v ? shared[Number(v[1])] ?? '' : '';
        }
        if (/\bt="inlineStr"/.test(attrs)) {
          return allMatches(/<t[^>]*>([\s\S]*?)<\/t>/g, body).map((t) => xmlDecode(t[1])).join('');
        }
        const v = /<v>([\s\S]*?)<\/v>/.exec(body);
        return v ? xmlDecode(v[1]) : '';
      });
      const rowText = cells.join(' ');
      if (rowText.trim()) out.push(rowText);
    }
  }
  return out.join('\n');
};

const extractZip: Extractor = async (buf, _name, depth) => {
  if (depth >= MAX_ARCHIVE_DEPTH) {
    throw new Error(`Archive nesting deeper than ${MAX_ARCHIVE_DEPTH} levels`);
  }
  const zip = await JSZip.loadAsync(buf);
  const out: string[] = [];

  for (const entry of Object.values(zip.files)) {
    if (entry.dir) continue;
    try {
      const data = await entry.async('nodebuffer');
      const text = await extractBuffer(data, entry.name, depth + 1);
      if (text.trim()) out.push(`File: ${entry.name}\n${text}`);
    } catch (err) {
      log.warn({ entry: entry.name, err: errorMessage(err) }, 'Skipping unreadable archive entry');
      out.push(`File: ${entry.name} - Error: ${errorMessage(err)}`);
    }
  }
  return out.join('\n');
};

const EXTRACTORS: Record<string, Extractor> = {
  '.txt': extractPlain,
  '.md': extractPlain,
  '.json': extractJson,
  '.csv': extractCsv,
  '.pdf': extractPdf,
  '.docx': extractDocx,
  '.xlsx': extractXlsx,
  '.zip': extractZip,
};

export function isExtractable(filename: string): boolean {
  return Object.prototype.hasOwnProperty.call(EXTRACTORS, path.extname(filename).toLowerCase());
}

async function extractBuffer(buf: Buffer, filename: string, depth: number): Promise<string> {
  const ext = path.extname(filename).toLowerCase();
  if (!isExtractable(filename)) throw new UnsupportedFileType(filename, ext);
  return EXTRACTORS[ext](buf, filename, depth);
}

/* ---------------- public API ---------------- */

/** Extract from an in-memory file; the format comes from `filename`'s extension. */
export function extractTextFromBuffer(buf: Buffer, filename: string): Promise<string> {
  return extractBuffer(buf, filename, 0);
}

export class FileTextExtractor implements TextExtractor {
  async extract(filePath: string): Promise<string> {
    const buf = await fs.readFile(filePath);
    return extractTextFromBuffer(buf, path.basename(filePath));
  }
}
