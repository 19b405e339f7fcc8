import PDFDocument from 'pdfkit';
import { ResultAsync as RA } from 'neverthrow';
import type { ResultAsync } from 'neverthrow';
import { describeCause } from '../../errors/formatter.js';
import { ReportRenderError } from '../../scoring/errors.js';
import { COMPANIES } from '../../scoring/job-scores.js';
import type { ReportJob, ReportRendererPort } from '../../scoring/ports/report-renderer.port.js';

export const REPORT_TITLE = 'ERW Job Scoring Report';

const NAVY = '#1a365d';
const BLUE = '#2c5282';
const ROW_FILL = '#f7fafc';
const GRID = '#e2e8f0';
const CELL_PADDING = 6;

type Align = 'left' | 'center';

const TABLE_COLUMNS: ReadonlyArray<{ readonly header: string; readonly width: number; readonly align: Align }> = [
  { header: 'Company', width: 108, align: 'left' },
  { header: 'Score', width: 43, align: 'center' },
  { header: 'Reasoning', width: 360, align: 'left' },
];

interface RowStyle {
  readonly font: string;
  readonly fontSize: number;
  readonly fill: string;
  readonly color: string;
}

const HEADER_ROW: RowStyle = { font: 'Helvetica-Bold', fontSize: 10, fill: NAVY, color: '#ffffff' };
const BODY_ROW: RowStyle = { font: 'Helvetica', fontSize: 9, fill: ROW_FILL, color: '#000000' };

/** e.g. "October 19, 2026 at 03:04 PM" */
export function formatGeneratedAt(date: Date): string {
  const day = date.toLocaleDateString('en-US', { month: 'long', day: '2-digit', year: 'numeric' });
  const time = date.toLocaleTimeString('en-US', { hour: '2-digit', minute: '2-digit', hour12: true });
  return `${day} at ${time}`;
}

export class PdfReportRenderer implements ReportRendererPort {
  render(jobs: readonly ReportJob[], generatedAt: Date): ResultAsync<Uint8Array, ReportRenderError> {
    return RA.fromPromise(
      renderReport(jobs, generatedAt),
      (cause) => new ReportRenderError(`PDF rendering failed: ${describeCause(cause)}`, cause)
    );
  }
}

function renderReport(jobs: readonly ReportJob[], generatedAt: Date): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const doc = new PDFDocument({
      size: 'LETTER',
      margins: { top: 36, bottom: 36, left: 36, right: 36 },
      info: { Title: REPORT_TITLE },
    });
    const chunks: Buffer[] = [];
    doc.on('data', (chunk: Buffer) => chunks.push(chunk));
    doc.on('end', () => resolve(Buffer.concat(chunks)));
    doc.on('error', reject);

    try {
      doc.font('Helvetica-Bold').fontSize(18).fillColor(NAVY).text(REPORT_TITLE);
      doc.moveDown(0.5);
      doc.font('Helvetica').fontSize(10).fillColor('#000000').text(`Generated: ${formatGeneratedAt(generatedAt)}`);
      doc.moveDown(1.5);

      for (const job of jobs) drawJob(doc, job);
      doc.end();
    } catch (error) {
      reject(error);
    }
  });
}

function drawJob(doc: PDFKit.PDFDocument, job: ReportJob): void {
  const { scores, summary } = job;

  doc.font('Helvetica-Bold').fontSize(14).fillColor(BLUE).text(`Job: ${job.filename}`);
  doc.moveDown(0.4);
  doc
    .font('Helvetica')
    .fontSize(10)
    .fillColor('#000000')
    .text(`Sheets analyzed: ${summary.total_sheets} (${summary.sheets_with_scope} with scope)`);
  doc.font('Helvetica-Bold').text(`Package Score: ${scores.package_score}/5`);
  doc.font('Helvetica').text(scores.overall_recommendation);
  doc.moveDown(0.8);

  drawRow(doc, TABLE_COLUMNS.map((c) => c.header), HEADER_ROW);
  for (const company of COMPANIES) {
    const entry = scores[company.key];
    drawRow(doc, [company.name, `${entry.score}/5`, entry.reasoning], BODY_ROW);
  }
  doc.moveDown(2.5);
}

function drawRow(doc: PDFKit.PDFDocument, cells: readonly string[], style: RowStyle): void {
  doc.font(style.font).fontSize(style.fontSize);

  const height =
    Math.max(
      ...TABLE_COLUMNS.map((column, i) =>
        doc.heightOfString(cells[i] ?? '', { width: column.width - 2 * CELL_PADDING })
      )
    ) +
    2 * CELL_PADDING;

  if (doc.y + height > doc.page.height - doc.page.margins.bottom) doc.addPage();

  const left = doc.page.margins.left;
  const top = doc.y;
  let x = left;
  TABLE_COLUMNS.forEach((column, i) => {
    doc.lineWidth(0.5).rect(x, top, column.width, height).fillAndStroke(style.fill, GRID);
    doc.fillColor(style.color).text(cells[i] ?? '', x + CELL_PADDING, top + CELL_PADDING, {
      width: column.width - 2 * CELL_PADDING,
      align: column.align,
    });
    x += column.width;
  });

  doc.x = left;
  doc.y = top + height;
}
