import fs from 'fs';
import { pieSlices } from './chart';
import { MonthlyReport } from './types';
import { debug } from '../log/logger';

/**
 * The drawing calls a report needs. A pdfkit document satisfies it.
 */
export interface ReportCanvas {
  font(name: string): unknown;
  fontSize(size: number): unknown;
  fillColor(color: string): unknown;
  text(text: string, x: number, y: number): unknown;
  path(d: string): unknown;
  fill(color: string): unknown;
  rect(x: number, y: number, width: number, height: number): unknown;
  pipe(destination: NodeJS.WritableStream): unknown;
  end(): void;
}

export type PdfFactory = () => ReportCanvas;

export type PdfLoader = () => Promise<PdfFactory | null>;

const PIE_GEOMETRY = { cx: 200, cy: 270, radius: 110 };

/**
 * Lays the report out on an A4 page (595 x 842 points, origin top left)
 */
export function drawReport(canvas: ReportCanvas, report: MonthlyReport) {
  canvas.fillColor('#000000');
  canvas.font('Helvetica-Bold');
  canvas.fontSize(16);
  canvas.text(report.title, 40, 50);

  canvas.font('Helvetica');
  canvas.fontSize(11);
  report.summary.forEach((line, i) => canvas.text(line, 40, 85 + i * 16));

  canvas.font('Helvetica-Bold');
  canvas.fontSize(12);
  canvas.text(`Category share — ${report.month}`, 40, 135);
  canvas.font('Helvetica');
  canvas.fontSize(11);

  const slices = pieSlices(report.share, PIE_GEOMETRY);
  slices.forEach((slice, i) => {
    canvas.path(slice.path);
    canvas.fill(slice.color);
    const legendY = 170 + i * 20;
    canvas.rect(350, legendY, 10, 10);
    canvas.fill(slice.color);
    canvas.fillColor('#000000');
    canvas.text(`${slice.label} (${slice.percent.toFixed(1)}%)`, 366, legendY);
  });

  canvas.fillColor('#000000');
  canvas.font('Helvetica-Bold');
  canvas.fontSize(12);
  canvas.text('Top expenses:', 40, 420);
  canvas.font('Helvetica');
  canvas.fontSize(11);
  report.topLines.forEach((line, i) => canvas.text(line, 40, 440 + i * 18));
}

/**
 * Loads pdfkit on first use. Resolves to null when it cannot be loaded.
 */
export async function loadPdfKit(): Promise<PdfFactory | null> {
  try {
    const { default: PDFDocument } = await import('pdfkit');
    return () => new PDFDocument({ size: 'A4', margin: 40 });
  } catch (error) {
    debug('pdfkit unavailable', { error: error instanceof Error ? error.message : String(error) });
    return null;
  }
}

/**
 * Draws the report into a new document and waits until the file is written
 */
export async function writePdfReport(factory: PdfFactory, report: MonthlyReport, filePath: string) {
  const doc = factory();
  const stream = fs.createWriteStream(filePath);
  const finished = new Promise<void>((resolve, reject) => {
    stream.on('finish', () => resolve());
    stream.on('error', reject);
  });
  doc.pipe(stream);
  drawReport(doc, report);
  doc.end();
  await finished;
}
