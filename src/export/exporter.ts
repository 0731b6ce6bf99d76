/**
 * Drama Collector — Exporter
 *
 * Writes canonical records to disk as JSON, CSV, Markdown or PDF, optionally
 * gzip-compressed. Each written file is reported with its size and an md5
 * checksum of the bytes on disk.
 */

import { createHash } from 'crypto';
import { mkdir, writeFile } from 'fs/promises';
import { join, resolve } from 'path';
import { promisify } from 'util';
import { gzip } from 'zlib';
import PDFDocument from 'pdfkit';
import type { CanonicalRecord, ExportedFile } from '../types';
import type { ExportConfig, ExportFormat } from '../config/schema';
import { ExportFailureError, errorMessage } from '../lib/errors';
import { systemClock, type Clock } from '../lib/clock';
import { logger } from '../lib/logger';

const gzipAsync = promisify(gzip);

// ============================================================
// TYPES
// ============================================================

export interface ExportOptions {
  outputDirectory?: string;
  includeMetadata?: boolean;
  compress?: boolean;
  /** File name prefix, default "dramas" */
  baseName?: string;
  /** Added to file names and metadata */
  jobId?: string;
}

export type ExporterDefaults = Pick<ExportConfig, 'outputDirectory' | 'includeMetadata' | 'compress' | 'pdfFontPath'>;

export interface RenderContext {
  exportedAt: string;
  includeMetadata: boolean;
  jobId?: string;
  pdfFontPath?: string;
}

const EXTENSIONS: Record<ExportFormat, string> = {
  json: 'json',
  csv: 'csv',
  markdown: 'md',
  pdf: 'pdf',
};

// ============================================================
// JSON EXPORT
// ============================================================

export function renderJson(records: readonly CanonicalRecord[], ctx: RenderContext): string {
  if (!ctx.includeMetadata) {
    return JSON.stringify(records, null, 2);
  }
  return JSON.stringify(
    {
      _metadata: {
        exportedAt: ctx.exportedAt,
        format: 'json',
        recordCount: records.length,
        jobId: ctx.jobId,
        version: '1.0',
      },
      records,
    },
    null,
    2
  );
}

// ============================================================
// CSV EXPORT
// ============================================================

export const CSV_COLUMNS = [
  'key',
  'title',
  'original_title',
  'year',
  'rating',
  'ratings_count',
  'episodes_count',
  'genres',
  'tags',
  'countries',
  'languages',
  'directors',
  'writers',
  'casts',
  'summary',
  'poster_url',
  'sources',
  'completeness_score',
  'quality_score',
] as const;

type CsvValue = string | number | readonly string[] | undefined;

function csvCell(value: CsvValue): string {
  if (value === undefined) return '';
  const text = typeof value === 'string' || typeof value === 'number' ? String(value) : value.join('; ');
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

function csvRow(record: CanonicalRecord): string {
  const { fields } = record;
  const cells: Record<(typeof CSV_COLUMNS)[number], CsvValue> = {
    key: record.key,
    title: fields.title,
    original_title: fields.originalTitle,
    year: fields.year,
    rating: fields.rating,
    ratings_count: fields.ratingsCount,
    episodes_count: fields.episodesCount,
    genres: fields.genres,
    tags: fields.tags,
    countries: fields.countries,
    languages: fields.languages,
    directors: fields.directors,
    writers: fields.writers,
    casts: fields.casts,
    summary: fields.summary,
    poster_url: fields.posterUrl,
    sources: record.sources,
    completeness_score: record.completenessScore,
    quality_score: record.qualityScore,
  };
  return CSV_COLUMNS.map(column => csvCell(cells[column])).join(',');
}

export function renderCsv(records: readonly CanonicalRecord[]): string {
  return [CSV_COLUMNS.join(','), ...records.map(csvRow)].join('\n') + '\n';
}

// ============================================================
// MARKDOWN EXPORT
// ============================================================

function heading(record: CanonicalRecord, index: number): string {
  const title = record.fields.title ?? record.key;
  return record.fields.year !== undefined
    ? `## ${index}. ${title} (${record.fields.year})`
    : `## ${index}. ${title}`;
}

export function renderMarkdown(records: readonly CanonicalRecord[], ctx: RenderContext): string {
  const lines: string[] = [];

  if (ctx.includeMetadata) {
    lines.push('---', `exported_at: ${ctx.exportedAt}`, 'format: markdown', `record_count: ${records.length}`);
    if (ctx.jobId) lines.push(`job_id: ${ctx.jobId}`);
    lines.push('---', '');
  }

  lines.push('# Drama Export', '');

  records.forEach((record, i) => {
    const { fields } = record;
    lines.push(heading(record, i + 1), '');
    if (fields.rating !== undefined) lines.push(`- **Rating:** ${fields.rating}`);
    if (fields.episodesCount !== undefined) lines.push(`- **Episodes:** ${fields.episodesCount}`);
    if (fields.genres?.length) lines.push(`- **Genres:** ${fields.genres.join(', ')}`);
    if (fields.directors?.length) lines.push(`- **Directors:** ${fields.directors.join(', ')}`);
    if (fields.casts?.length) lines.push(`- **Cast:** ${fields.casts.join(', ')}`);
    lines.push(`- **Sources:** ${record.sources.join(', ')}`);
    lines.push(`- **Completeness:** ${record.completenessScore}`);
    if (fields.summary) lines.push('', fields.summary);
    lines.push('');
  });

  return lines.join('\n');
}

// ============================================================
// PDF EXPORT (using pdfkit)
// ============================================================

const PDF_COLORS = {
  primary: '#1a1a2e',
  text: '#1f2937',
  muted: '#6b7280',
  border: '#e5e7eb',
};

export function renderPdf(records: readonly CanonicalRecord[], ctx: RenderContext): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    try {
      const chunks: Buffer[] = [];
      const doc = new PDFDocument({
        size: 'A4',
        margins: { top: 50, bottom: 50, left: 50, right: 50 },
        info: {
          Title: 'Drama Export',
          Subject: 'Short drama metadata',
          CreationDate: new Date(ctx.exportedAt),
        },
      });

      doc.on('data', (chunk: Buffer) => chunks.push(chunk));
      doc.on('end', () => resolve(Buffer.concat(chunks)));
      doc.on('error', reject);

      if (ctx.pdfFontPath) doc.font(ctx.pdfFontPath);

      doc.fontSize(18).fillColor(PDF_COLORS.primary).text('Drama Export', { align: 'center' });
      doc.moveDown(0.3);
      if (ctx.includeMetadata) {
        doc.fontSize(10).fillColor(PDF_COLORS.muted)
          .text(`${records.length} records | ${ctx.exportedAt}`, { align: 'center' });
      }
      doc.moveDown(0.5);
      doc.strokeColor(PDF_COLORS.border).lineWidth(1)
        .moveTo(50, doc.y)
        .lineTo(545, doc.y)
        .stroke();
      doc.moveDown(1);

      records.forEach((record, i) => {
        if (doc.y > 700) doc.addPage();

        const { fields } = record;
        const year = fields.year !== undefined ? ` (${fields.year})` : '';
        doc.fontSize(12).fillColor(PDF_COLORS.primary).text(`${i + 1}. ${fields.title ?? record.key}${year}`);
        doc.moveDown(0.3);
        doc.fontSize(9).fillColor(PDF_COLORS.text);
        if (fields.rating !== undefined) doc.text(`Rating: ${fields.rating}`);
        if (fields.genres?.length) doc.text(`Genres: ${fields.genres.join(', ')}`);
        doc.text(`Sources: ${record.sources.join(', ')} | Completeness: ${record.completenessScore}`);
        if (fields.summary) {
          doc.moveDown(0.3);
          doc.text(fields.summary);
        }
        doc.moveDown(1);
      });

      doc.end();
    } catch (error) {
      reject(error);
    }
  });
}

// ============================================================
// EXPORTER
// ============================================================

function timestampForFile(iso: string): string {
  // 2024-05-01T12:34:56.789Z -> 20240501_123456
  return iso.replace(/[-:]/g, '').replace('T', '_').slice(0, 15);
}

export class DataExporter {
  private readonly clock: Clock;
  private readonly log = logger.child({ component: 'exporter' });

  constructor(private readonly defaults: ExporterDefaults, clock: Clock = systemClock) {
    this.clock = clock;
  }

  /**
   * Write `records` in every requested format. The first failure aborts the
   * export with ExportFailureError; files already written stay on disk.
   */
  async export(
    records: readonly CanonicalRecord[],
    formats: readonly ExportFormat[],
    options: ExportOptions = {}
  ): Promise<ExportedFile[]> {
    const directory = resolve(options.outputDirectory ?? this.defaults.outputDirectory);
    const compress = options.compress ?? this.defaults.compress;
    const exportedAt = new Date(this.clock.now()).toISOString();
    const ctx: RenderContext = {
      exportedAt,
      includeMetadata: options.includeMetadata ?? this.defaults.includeMetadata,
      jobId: options.jobId,
      pdfFontPath: this.defaults.pdfFontPath,
    };

    try {
      await mkdir(directory, { recursive: true });
    } catch (error) {
      throw new ExportFailureError(`Cannot create ${directory}: ${errorMessage(error)}`, undefined, { cause: error });
    }

    const stem = [options.baseName ?? 'dramas', options.jobId, timestampForFile(exportedAt)]
      .filter(Boolean)
      .join('_');

    const files: ExportedFile[] = [];
    for (const format of new Set(formats)) {
      files.push(await this.writeFormat(records, format, directory, stem, compress, ctx));
    }

    return files;
  }

  private async writeFormat(
    records: readonly CanonicalRecord[],
    format: ExportFormat,
    directory: string,
    stem: string,
    compress: boolean,
    ctx: RenderContext
  ): Promise<ExportedFile> {
    const filename = `${stem}.${EXTENSIONS[format]}${compress ? '.gz' : ''}`;
    const path = join(directory, filename);

    try {
      let content = await this.render(records, format, ctx);
      if (compress) content = await gzipAsync(content);
      await writeFile(path, content);

      const file: ExportedFile = {
        path,
        size: content.length,
        format,
        recordCount: records.length,
        checksum: createHash('md5').update(content).digest('hex'),
      };
      this.log.info('Export written', { format, path, size: file.size, records: records.length });
      return file;
    } catch (error) {
      throw new ExportFailureError(`${format} export failed: ${errorMessage(error)}`, format, { cause: error });
    }
  }

  private async render(
    records: readonly CanonicalRecord[],
    format: ExportFormat,
    ctx: RenderContext
  ): Promise<Buffer> {
    switch (format) {
      case 'json':
        return Buffer.from(renderJson(records, ctx), 'utf-8');
      case 'csv':
        return Buffer.from(renderCsv(records), 'utf-8');
      case 'markdown':
        return Buffer.from(renderMarkdown(records, ctx), 'utf-8');
      case 'pdf':
        return renderPdf(records, ctx);
    }
  }
}
