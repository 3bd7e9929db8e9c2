/**
 * Offense-type pie chart, rendered to PNG with @napi-rs/canvas (prebuilt binaries, no system deps).
 * Layout follows the usual plotting defaults: first slice starts at 140°, slices run counter-clockwise.
 */

import { createCanvas, type SKRSContext2D } from '@napi-rs/canvas';

export interface PieSlice {
  label: string;
  count: number;
  fraction: number;
  percentLabel: string;
  /** Degrees, counter-clockwise from the positive x axis. */
  startAngle: number;
  endAngle: number;
  color: string;
}

export interface PieChartOptions {
  title?: string;
  size?: number;
  startAngle?: number;
}

const PALETTE = [
  '#1f77b4',
  '#ff7f0e',
  '#2ca02c',
  '#d62728',
  '#9467bd',
  '#8c564b',
  '#e377c2',
  '#7f7f7f',
  '#bcbd22',
  '#17becf',
];

const DEFAULT_TITLE = 'Offensive Comment Type Distribution';
const DEFAULT_START_ANGLE = 140;
const DEFAULT_SIZE = 600;

export function computePieSlices(counts: ReadonlyMap<string, number>, startAngle: number = DEFAULT_START_ANGLE): PieSlice[] {
  const entries = [...counts.entries()].filter(([, count]) => count > 0);
  const total = entries.reduce((sum, [, count]) => sum + count, 0);
  if (total === 0) {
    return [];
  }

  const slices: PieSlice[] = [];
  let cursor = startAngle;
  entries.forEach(([label, count], index) => {
    const fraction = count / total;
    const sweep = fraction * 360;
    slices.push({
      label,
      count,
      fraction,
      percentLabel: `${(fraction * 100).toFixed(1)}%`,
      startAngle: cursor,
      endAngle: cursor + sweep,
      color: PALETTE[index % PALETTE.length] ?? '#7f7f7f',
    });
    cursor += sweep;
  });
  return slices;
}

export async function renderPieChart(counts: ReadonlyMap<string, number>, options: PieChartOptions = {}): Promise<Buffer> {
  const slices = computePieSlices(counts, options.startAngle);
  if (slices.length === 0) {
    throw new Error('Cannot draw a pie chart without any counts.');
  }

  const size = options.size ?? DEFAULT_SIZE;
  const canvas = createCanvas(size, size);
  const ctx = canvas.getContext('2d');

  ctx.fillStyle = '#ffffff';
  ctx.fillRect(0, 0, size, size);

  ctx.fillStyle = '#000000';
  ctx.font = `bold ${Math.round(size / 36)}px sans-serif`;
  ctx.textAlign = 'center';
  ctx.textBaseline = 'top';
  ctx.fillText(options.title ?? DEFAULT_TITLE, size / 2, size * 0.04);

  const centerX = size / 2;
  const centerY = size * 0.54;
  const radius = size * 0.32;

  for (const slice of slices) {
    drawSlice(ctx, centerX, centerY, radius, slice);
  }

  ctx.font = `${Math.round(size / 46)}px sans-serif`;
  ctx.textBaseline = 'middle';
  for (const slice of slices) {
    const mid = toRadians((slice.startAngle + slice.endAngle) / 2);
    const cos = Math.cos(mid);
    const sin = Math.sin(mid);

    ctx.fillStyle = '#000000';
    ctx.textAlign = cos >= 0 ? 'left' : 'right';
    ctx.fillText(slice.label, centerX + cos * radius * 1.1, centerY - sin * radius * 1.1);

    ctx.textAlign = 'center';
    ctx.fillText(slice.percentLabel, centerX + cos * radius * 0.6, centerY - sin * radius * 0.6);
  }

  return canvas.encode('png');
}

function drawSlice(ctx: SKRSContext2D, x: number, y: number, radius: number, slice: PieSlice) {
  // canvas y grows downward, so math angles are negated and drawn anticlockwise
  ctx.beginPath();
  ctx.moveTo(x, y);
  ctx.arc(x, y, radius, -toRadians(slice.startAngle), -toRadians(slice.endAngle), true);
  ctx.closePath();
  ctx.fillStyle = slice.color;
  ctx.fill();
}

function toRadians(degrees: number): number {
  return (degrees * Math.PI) / 180;
}
