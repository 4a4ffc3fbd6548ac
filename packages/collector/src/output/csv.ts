import { appendFileSync, existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { RECORD_COLUMNS } from '@rfmapper/shared';
import type { RecordColumn, SignalRecord } from '@rfmapper/shared';
import { MapperError, OutputConflictError } from '../errors.js';
import type { Prompter } from '../prompt.js';

/** Where the acquisition loop writes records */
export interface RecordSink {
  readonly path: string;
  append(record: SignalRecord): void;
}

function quote(field: string): string {
  return /[",\r\n]/.test(field) ? `"${field.replace(/"/g, '""')}"` : field;
}

function numberField(value: number | null): string {
  return value === null ? '' : String(value);
}

export function formatRow(record: SignalRecord): string {
  return [
    quote(record.timestamp),
    numberField(record.level),
    quote(record.label),
    numberField(record.latitude),
    numberField(record.longitude),
    numberField(record.elevation),
  ].join(',');
}

/** Split one CSV line, honouring double-quoted fields */
export function splitRow(line: string): string[] {
  const fields: string[] = [];
  let field = '';
  let quoted = false;
  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (quoted) {
      if (ch === '"' && line[i + 1] === '"') {
        field += '"';
        i++;
      } else if (ch === '"') {
        quoted = false;
      } else {
        field += ch;
      }
    } else if (ch === '"') {
      quoted = true;
    } else if (ch === ',') {
      fields.push(field);
      field = '';
    } else {
      field += ch;
    }
  }
  fields.push(field);
  return fields;
}

/**
 * Append-only CSV file of signal records. The header is written once when
 * the sink is created; every append goes straight to disk so a crash loses
 * at most the current tick.
 */
export class CsvRecordSink implements RecordSink {
  private rows = 0;

  private constructor(readonly path: string) {}

  get rowCount() { return this.rows; }

  /**
   * Create (or, with the operator's agreement, overwrite) the file at `path`.
   * Throws OutputConflictError when the file exists and overwriting is declined.
   */
  static async create(path: string, prompter: Prompter, assumeYes = false): Promise<CsvRecordSink> {
    if (existsSync(path)) {
      const overwrite = assumeYes || await prompter.confirm(`💾 ${path} already exists. Overwrite it?`);
      if (!overwrite) {
        throw new OutputConflictError(`Refusing to overwrite ${path}; pick another --output or pass --yes`);
      }
      console.warn(`💾 Overwriting ${path}`);
    }
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, `${RECORD_COLUMNS.join(',')}\n`);
    console.log(`💾 Writing records to ${path}`);
    return new CsvRecordSink(path);
  }

  append(record: SignalRecord) {
    appendFileSync(this.path, `${formatRow(record)}\n`);
    this.rows++;
  }
}

function parseNullable(field: string | undefined, column: string, lineNo: number): number | null {
  if (field === undefined || field.trim() === '') return null;
  const value = Number(field);
  if (Number.isNaN(value)) throw new MapperError(`line ${lineNo}: ${column} is not a number: "${field}"`);
  return value;
}

/** Read a file written by CsvRecordSink back into records */
export function readRecords(path: string): SignalRecord[] {
  if (!existsSync(path)) throw new MapperError(`No data file at ${path}; run collect-data first`);

  const lines = readFileSync(path, 'utf-8').split(/\r?\n/).filter((line) => line.trim() !== '');
  if (lines.length === 0) return [];

  const header = splitRow(lines[0]);
  const columns = new Map(header.map((name, i) => [name.trim(), i]));
  const missing = RECORD_COLUMNS.filter((name) => !columns.has(name));
  if (missing.length > 0) {
    throw new MapperError(`${path} is missing column(s): ${missing.join(', ')}`);
  }
  const at = (fields: string[], name: RecordColumn) => fields[columns.get(name) ?? -1];

  return lines.slice(1).map((line, i) => {
    const lineNo = i + 2;
    const fields = splitRow(line);
    const level = parseNullable(at(fields, 'signal_strength_db'), 'signal_strength_db', lineNo);
    if (level === null) throw new MapperError(`line ${lineNo}: signal_strength_db is empty`);
    return {
      timestamp: at(fields, 'timestamp') ?? '',
      level,
      label: at(fields, 's_unit') ?? '',
      latitude: parseNullable(at(fields, 'latitude'), 'latitude', lineNo),
      longitude: parseNullable(at(fields, 'longitude'), 'longitude', lineNo),
      elevation: parseNullable(at(fields, 'elevation'), 'elevation', lineNo),
    };
  });
}
