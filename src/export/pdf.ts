/**
 * Renders a report model to PDF with pdfkit.
 */

import PDFDocument from 'pdfkit';

import type { ReportDocument } from './report';

const MARGIN = 50;
const ROW_HEIGHT = 18;

export function renderReportPdf(report: ReportDocument): Promise<Buffer> {
    return new Promise((resolve, reject) => {
        const doc = new PDFDocument({ size: 'A4', margin: MARGIN, info: { Title: report.title } });
        const chunks: Buffer[] = [];
        doc.on('data', (chunk: Buffer) => chunks.push(chunk));
        doc.on('end', () => resolve(Buffer.concat(chunks)));
        doc.on('error', reject);

        doc.font('Helvetica-Bold').fontSize(20).text(report.title);
        doc.font('Helvetica').fontSize(10).fillColor('#555555').text(report.subtitle);
        doc.moveDown(0.5);
        doc.fillColor('#000000').fontSize(11);
        for (const line of report.summary) {
            doc.text(line);
        }
        doc.moveDown();

        if (report.rows.length === 0) {
            doc.font('Helvetica-Oblique').text(report.emptyMessage);
            doc.end();
            return;
        }

        const usableWidth = doc.page.width - MARGIN * 2;
        const totalWeight = report.columns.reduce((sum, column) => sum + column.weight, 0);
        const widths = report.columns.map((column) => (column.weight / totalWeight) * usableWidth);

        const drawRow = (cells: string[], bold: boolean): void => {
            if (doc.y + ROW_HEIGHT > doc.page.height - MARGIN) {
                doc.addPage();
            }
            const y = doc.y;
            let x = MARGIN;
            doc.font(bold ? 'Helvetica-Bold' : 'Helvetica').fontSize(10);
            cells.forEach((cell, index) => {
                doc.text(cell, x, y, { width: widths[index] - 4, lineBreak: false, ellipsis: true });
                x += widths[index];
            });
            doc.x = MARGIN;
            doc.y = y + ROW_HEIGHT;
        };

        drawRow(
            report.columns.map((column) => column.header),
            true
        );
        for (const row of report.rows) {
            drawRow(row, false);
        }
        doc.end();
    });
}
