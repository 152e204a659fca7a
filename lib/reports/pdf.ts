import PDFDocument from "pdfkit";
import type { BarChart, Block, Chart, Point, ReportDocument, ScatterChart } from "./document";

type Doc = PDFKit.PDFDocument;

const MARGIN = 36;
const CHART_HEIGHT = 220;
const PALETTE = ["#1f77b4", "#ff7f0e", "#2ca02c", "#d62728", "#9467bd", "#8c564b", "#e377c2", "#17becf"];

type Box = { x: number; y: number; w: number; h: number };
type Range = [number, number];

function pageBottom(doc: Doc): number {
  return doc.page.height - doc.page.margins.bottom;
}

function ensureRoom(doc: Doc, height: number) {
  if (doc.y + height > pageBottom(doc)) doc.addPage();
}

function rangeOf(values: number[], pad = 0.05): Range {
  if (values.length === 0) return [0, 1];
  let lo = Math.min(...values);
  let hi = Math.max(...values);
  if (lo === hi) {
    lo -= 1;
    hi += 1;
  }
  const d = (hi - lo) * pad;
  return [lo - d, hi + d];
}

function scale(v: number, [lo, hi]: Range, from: number, to: number): number {
  return from + ((v - lo) / (hi - lo)) * (to - from);
}

function frame(doc: Doc, box: Box, title: string, xLabel: string, yLabel: string, xr: Range, yr: Range) {
  doc.fillColor("black").font("Helvetica-Bold").fontSize(10).text(title, box.x, box.y - 16, { width: box.w, align: "center" });
  doc.lineWidth(0.5).strokeColor("#555555").rect(box.x, box.y, box.w, box.h).stroke();
  doc.font("Helvetica").fontSize(7).fillColor("#333333");
  doc.text(xr[0].toFixed(1), box.x, box.y + box.h + 2);
  doc.text(xr[1].toFixed(1), box.x + box.w - 40, box.y + box.h + 2, { width: 40, align: "right" });
  doc.text(yr[1].toFixed(1), box.x - 34, box.y, { width: 30, align: "right" });
  doc.text(yr[0].toFixed(1), box.x - 34, box.y + box.h - 8, { width: 30, align: "right" });
  doc.fontSize(8).text(xLabel, box.x, box.y + box.h + 12, { width: box.w, align: "center" });
  doc.text(yLabel, MARGIN, box.y + box.h / 2, { width: box.x - MARGIN - 36 });
}

// Ellipse outline computed in data space, so unequal axis scales stay correct.
function ellipsePath(cx: number, cy: number, w: number, h: number, angleDeg: number, steps = 72): Point[] {
  const a = w / 2;
  const b = h / 2;
  const t = (angleDeg * Math.PI) / 180;
  const out: Point[] = [];
  for (let i = 0; i <= steps; i++) {
    const u = (2 * Math.PI * i) / steps;
    out.push([cx + a * Math.cos(u) * Math.cos(t) - b * Math.sin(u) * Math.sin(t), cy + a * Math.cos(u) * Math.sin(t) + b * Math.sin(u) * Math.cos(t)]);
  }
  return out;
}

function drawScatter(doc: Doc, chart: ScatterChart, box: Box) {
  const all = chart.series.flatMap((s) => s.points);
  const xr = rangeOf(all.map((p) => p[0]));
  const yr = chart.yRange ?? rangeOf(all.map((p) => p[1]));
  const px = (x: number) => scale(x, xr, box.x, box.x + box.w);
  const py = (y: number) => scale(Math.min(yr[1], Math.max(yr[0], y)), yr, box.y + box.h, box.y);

  doc.save();
  doc.rect(box.x, box.y, box.w, box.h).clip();
  if (chart.band) {
    const top = py(chart.band.max);
    doc.fillColor("#2ca02c").fillOpacity(0.15).rect(box.x, top, box.w, py(chart.band.min) - top).fill();
    doc.fillOpacity(1);
  }
  if (yr[0] < 0 && yr[1] > 0) doc.lineWidth(0.5).strokeColor("#999999").moveTo(box.x, py(0)).lineTo(box.x + box.w, py(0)).stroke();

  chart.series.forEach((s, i) => {
    doc.fillColor(PALETTE[i % PALETTE.length]);
    for (const [x, y] of s.points) doc.circle(px(x), py(y), 2).fill();
  });

  for (const { ellipse: e, dashed } of chart.ellipses ?? []) {
    const path = ellipsePath(e.cx, e.cy, e.width, e.height, e.angleDeg);
    doc.lineWidth(1.2).strokeColor("#333333");
    if (dashed) doc.dash(4, { space: 3 });
    doc.moveTo(px(path[0][0]), py(path[0][1]));
    for (const [x, y] of path.slice(1)) doc.lineTo(px(x), py(y));
    doc.stroke();
    doc.undash();
  }
  doc.restore();

  frame(doc, box, chart.title, chart.xLabel, chart.yLabel, xr, yr);
  if (chart.series.length > 1) {
    let lx = box.x;
    chart.series.forEach((s, i) => {
      doc.fillColor(PALETTE[i % PALETTE.length]).circle(lx + 3, box.y + box.h + 30, 3).fill();
      doc.fillColor("black").fontSize(7).text(s.label, lx + 8, box.y + box.h + 27, { lineBreak: false });
      lx += 12 + doc.widthOfString(s.label) + 10;
    });
  }
}

function drawBars(doc: Doc, chart: BarChart, box: Box) {
  const values = chart.bars.map((b) => b.value).filter((v): v is number => v !== null && Number.isFinite(v));
  const yr: Range = [Math.min(0, ...values), Math.max(0, ...values) || 1];
  const slot = box.w / Math.max(chart.bars.length, 1);
  chart.bars.forEach((b, i) => {
    const x = box.x + i * slot + slot * 0.15;
    if (b.value !== null && Number.isFinite(b.value)) {
      const y0 = scale(0, yr, box.y + box.h, box.y);
      const y1 = scale(b.value, yr, box.y + box.h, box.y);
      doc.fillColor(PALETTE[0]).rect(x, Math.min(y0, y1), slot * 0.7, Math.abs(y1 - y0)).fill();
    }
    doc.fillColor("black").font("Helvetica").fontSize(7);
    doc.text(b.label, x, box.y + box.h + 2, { width: slot * 0.7, align: "center", lineBreak: false });
  });
  frame(doc, box, chart.title, "", chart.yLabel, [0, chart.bars.length], yr);
}

function drawChart(doc: Doc, chart: Chart) {
  ensureRoom(doc, CHART_HEIGHT + 70);
  const box: Box = { x: MARGIN + 70, y: doc.y + 20, w: doc.page.width - 2 * MARGIN - 80, h: CHART_HEIGHT };
  if (chart.kind === "scatter") drawScatter(doc, chart, box);
  else drawBars(doc, chart, box);
  doc.x = MARGIN;
  doc.y = box.y + box.h + 44;
}

function drawTable(doc: Doc, header: string[], rows: string[][]) {
  const width = doc.page.width - 2 * MARGIN;
  const col = width / Math.max(header.length, 1);
  const size = header.length > 8 ? 6 : 9;
  const rowH = size + 6;
  const line = (cells: string[], bold: boolean) => {
    ensureRoom(doc, rowH);
    const y = doc.y;
    if (bold) doc.fillColor("#f2f2f2").rect(MARGIN, y - 2, width, rowH).fill();
    doc.fillColor("black").font(bold ? "Helvetica-Bold" : "Helvetica").fontSize(size);
    cells.forEach((c, i) => doc.text(c, MARGIN + i * col + 2, y, { width: col - 4, lineBreak: false, ellipsis: true }));
    doc.strokeColor("#dddddd").lineWidth(0.5).moveTo(MARGIN, y + rowH - 2).lineTo(MARGIN + width, y + rowH - 2).stroke();
    doc.x = MARGIN;
    doc.y = y + rowH;
  };
  line(header, true);
  for (const r of rows) line(r, false);
  doc.moveDown(0.5);
}

function drawBlock(doc: Doc, block: Block) {
  switch (block.type) {
    case "heading":
      ensureRoom(doc, 40);
      doc.moveDown(0.5).fillColor("black").font("Helvetica-Bold").fontSize(block.level === 1 ? 14 : 12).text(block.text);
      doc.moveDown(0.3);
      return;
    case "paragraph":
      doc.fillColor("black").font("Helvetica").fontSize(10).text(block.text, { align: "left" });
      doc.moveDown(0.4);
      return;
    case "keyValue":
      for (const [k, v] of block.rows) {
        doc.font("Helvetica-Bold").fontSize(10).fillColor("black").text(`${k}: `, { continued: true });
        doc.font("Helvetica").text(v);
      }
      doc.moveDown(0.5);
      return;
    case "table":
      drawTable(doc, block.header, block.rows);
      return;
    case "chart":
      drawChart(doc, block.chart);
      return;
    case "pageBreak":
      doc.addPage();
      return;
  }
}

/** Renders a report to PDF bytes (A4, Helvetica). */
export function renderPdf(report: ReportDocument): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const doc = new PDFDocument({ size: "A4", margin: MARGIN, info: { Title: report.title } });
    const chunks: Buffer[] = [];
    doc.on("data", (c: Buffer) => chunks.push(c));
    doc.on("end", () => resolve(Buffer.concat(chunks)));
    doc.on("error", reject);
    try {
      doc.font("Helvetica-Bold").fontSize(18).text(report.title);
      doc.moveDown();
      for (const b of report.blocks) drawBlock(doc, b);
      doc.end();
    } catch (e) {
      reject(e);
    }
  });
}
