/**
 * SVG plan view of a distribution: load strips, beam lines, tributary bands
 * and the resulting line load on each beam.
 *
 * The horizontal axis runs along the beams, the vertical axis is the
 * transverse axis the loads are distributed along (upwards positive).
 */
import fs from "node:fs";
import path from "node:path";
import type { DistributionResult, RegionalLoad } from "./types.js";

const BAND_COLORS = ["#1565c0", "#7b1fa2", "#2e7d32", "#ef6c00"];

function escapeXml(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/"/g, "&quot;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;");
}

function r2(n: number): number {
  return Math.round(n * 100) / 100;
}

export function renderDiagram(result: DistributionResult, loads: readonly RegionalLoad[]): string {
  const width = 800;
  const height = 600;
  const margin = { top: 50, right: 230, bottom: 50, left: 90 };
  const plotWidth = width - margin.left - margin.right;
  const plotHeight = height - margin.top - margin.bottom;

  const { systemMin, systemMax } = result.details;
  const span = systemMax - systemMin || 1;
  const maxLength = [...loads, ...result.beams].reduce((m, item) => Math.max(m, item.length), 0) || 1;

  const xScale = (x: number) => r2(margin.left + (x / maxLength) * plotWidth);
  const yScale = (y: number) => r2(margin.top + plotHeight - ((y - systemMin) / span) * plotHeight);

  const lines: string[] = [];
  lines.push(`<svg xmlns="http://www.w3.org/2000/svg" viewBox="0 0 ${width} ${height}" width="${width}" height="${height}" font-family="Arial, sans-serif" font-size="11">`);
  lines.push(`<rect width="${width}" height="${height}" fill="#fafafa" rx="4"/>`);
  lines.push(`<text x="${width / 2}" y="24" text-anchor="middle" font-size="14" font-weight="bold">Tributary Load Distribution - ${result.beams.length} beam(s), ${loads.length} load(s)</text>`);

  // ── Tributary bands ──
  result.beams.forEach((beam, i) => {
    const color = BAND_COLORS[i % BAND_COLORS.length] ?? "#1565c0";
    const top = yScale(beam.zone.end);
    const bottom = yScale(beam.zone.start);
    const zoneWidth = beam.zone.end - beam.zone.start;
    lines.push(`<rect x="${margin.left}" y="${top}" width="${plotWidth}" height="${r2(bottom - top)}" fill="${color}" fill-opacity="0.08" stroke="none"/>`);
    const labelX = margin.left + plotWidth + 12;
    lines.push(`<line x1="${labelX - 6}" y1="${top}" x2="${labelX - 6}" y2="${bottom}" stroke="${color}" stroke-width="1.5"/>`);
    lines.push(`<text x="${labelX}" y="${r2((top + bottom) / 2)}" fill="${color}" font-size="10">${escapeXml(beam.name)} zone (${zoneWidth.toFixed(2)} m)</text>`);
  });

  // ── Load strips ──
  for (const load of loads) {
    const top = yScale(load.yEnd);
    const bottom = yScale(load.yStart);
    const x0 = xScale(0);
    const x1 = xScale(load.length);
    lines.push(`<rect x="${x0}" y="${top}" width="${r2(x1 - x0)}" height="${r2(bottom - top)}" fill="${escapeXml(load.color)}" fill-opacity="0.6" stroke="#000" stroke-width="1"/>`);
    lines.push(`<text x="${r2((x0 + x1) / 2)}" y="${r2((top + bottom) / 2)}" text-anchor="middle" fill="#fff" font-weight="bold">${escapeXml(load.name)} (${(load.yEnd - load.yStart).toFixed(2)} m, ${load.intensity} kN/m²)</text>`);
  }

  // ── Zone boundaries ──
  result.beams.forEach((beam, i) => {
    if (i === 0) return;
    const y = yScale(beam.zone.start);
    lines.push(`<line x1="${margin.left}" y1="${y}" x2="${margin.left + plotWidth}" y2="${y}" stroke="#1565c0" stroke-width="2" stroke-dasharray="6,4"/>`);
  });

  // ── Beams ──
  for (const beam of result.beams) {
    const y = yScale(beam.position);
    lines.push(`<line x1="${xScale(0)}" y1="${y}" x2="${xScale(beam.length)}" y2="${y}" stroke="#555" stroke-width="4"/>`);
    lines.push(`<text x="${margin.left - 6}" y="${r2(y + 4)}" text-anchor="end" font-weight="bold">${escapeXml(beam.name)}</text>`);
  }

  // ── Results ──
  const boxX = margin.left + plotWidth + 12;
  let boxY = height - margin.bottom - result.beams.length * 16;
  for (const beam of result.beams) {
    lines.push(`<text x="${boxX}" y="${boxY}" font-size="10" fill="#333">${escapeXml(beam.name)}: ${beam.total.toFixed(3)} kN/m</text>`);
    boxY += 16;
  }

  lines.push(`<text x="${width / 2}" y="${height - 12}" text-anchor="middle" font-size="10" fill="#555">applied = ${result.appliedLoad.toFixed(3)} kN/m | distributed = ${result.totalLoad.toFixed(3)} kN/m</text>`);
  lines.push(`</svg>`);
  return lines.join("\n");
}

/** Write an SVG to disk, creating parent directories. Returns the resolved path. */
export function writeDiagram(outputPath: string, svg: string): string {
  const resolvedPath = path.resolve(outputPath);
  fs.mkdirSync(path.dirname(resolvedPath), { recursive: true });
  fs.writeFileSync(resolvedPath, svg, "utf-8");
  return resolvedPath;
}
