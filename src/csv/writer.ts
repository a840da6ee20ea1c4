import { createWriteStream, WriteStream } from 'node:fs';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import { finished } from 'node:stream/promises';

export interface CsvRow {
  index: number;
  question: string;
  mode: string;
  source: string;
  elapsed_ms: number;
  status: 'ok' | 'error';
  answer: string;
  error_kind: string;
  error_message: string;
}

const HEADER: ReadonlyArray<keyof CsvRow> = [
  'index',
  'question',
  'mode',
  'source',
  'elapsed_ms',
  'status',
  'answer',
  'error_kind',
  'error_message',
];

export class CsvStreamWriter {
  private constructor(private readonly destination: string, private readonly stream: WriteStream) {}

  static async create(destination: string): Promise<CsvStreamWriter> {
    await fs.mkdir(path.dirname(destination), { recursive: true });
    const stream = createWriteStream(destination, { encoding: 'utf8' });
    stream.write(`${HEADER.join(',')}\n`);
    return new CsvStreamWriter(destination, stream);
  }

  async writeRow(row: CsvRow): Promise<void> {
    if (!this.stream.write(`${formatCsvLine(row)}\n`)) {
      await onceDrain(this.stream);
    }
  }

  async close(): Promise<void> {
    this.stream.end();
    await finished(this.stream);
  }

  get path(): string {
    return this.destination;
  }
}

export function formatCsvLine(row: CsvRow): string {
  return HEADER.map((key) => csvEscape(String(row[key]))).join(',');
}

async function onceDrain(stream: WriteStream): Promise<void> {
  await new Promise<void>((resolve) => stream.once('drain', resolve));
}

export function csvEscape(value: string): string {
  const sanitized = value.replace(/\r?\n/g, ' ').replace(/"/g, '""');
  const needsQuotes = value.includes(',') || value.includes('\n') || value.includes('"');
  return needsQuotes ? `"${sanitized}"` : sanitized;
}
