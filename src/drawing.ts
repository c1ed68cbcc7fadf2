// ═══════════════════════════════════════════════════════════════
//  Drawing utilities: canvas prep, arrows, labels, colors
// ═══════════════════════════════════════════════════════════════

import { createCanvas, type Canvas, type SKRSContext2D } from '@napi-rs/canvas';

export type RGB = readonly [number, number, number];

const LABEL_FONT = 'bold 14px sans-serif';
const LABEL_BG = 'rgba(13, 17, 23, 0.88)';

/** Create an off-screen canvas of w×h pixels and return { canvas, c, w, h }. */
export function prepCanvas(w: number, h: number): {
  canvas: Canvas;
  c: SKRSContext2D;
  w: number;
  h: number;
} {
  const canvas = createCanvas(w, h);
  const c = canvas.getContext('2d');
  return { canvas, c, w, h };
}

/** CSS color string for an RGB triple, optionally darkened by `shade` ∈ [0,1]. */
export function rgbColor(rgb: RGB, shade = 0): string {
  const k = 1 - shade;
  const [r, g, b] = rgb.map(ch => Math.round(Math.max(0, Math.min(255, ch * k))));
  return `rgb(${r}, ${g}, ${b})`;
}

/** Text with a dark backing box, anchored at its bottom centre. */
export function drawLabel(
  c: SKRSContext2D,
  text: string,
  x: number, y: number,
  color: string,
  font: string = LABEL_FONT,
): void {
  c.save();
  c.font = font;
  c.textAlign = 'center';
  c.textBaseline = 'bottom';
  const metrics = c.measureText(text);
  const tw = metrics.width + 10, th = 18;
  c.fillStyle = LABEL_BG;
  c.fillRect(x - tw / 2, y - th, tw, th);
  c.fillStyle = color;
  c.fillText(text, x, y - 2);
  c.restore();
}

/**
 * Draw an arrow from (x1,y1) to (x2,y2) with optional label.
 * The label sits 70% of the way towards the head, offset to the side.
 */
export function drawArrow(
  c: SKRSContext2D,
  x1: number, y1: number, x2: number, y2: number,
  color: string,
  label?: string | null,
  headSize?: number,
): void {
  headSize = headSize || 10;
  const dx = x2 - x1, dy = y2 - y1;
  const len = Math.sqrt(dx * dx + dy * dy);
  if (len < 1) return;
  const ang = Math.atan2(dy, dx);

  c.save();
  c.strokeStyle = color;
  c.fillStyle = color;
  c.lineWidth = 2.5;
  c.beginPath();
  c.moveTo(x1, y1);
  c.lineTo(x2, y2);
  c.stroke();

  // Arrowhead
  c.beginPath();
  c.moveTo(x2, y2);
  c.lineTo(x2 - headSize * Math.cos(ang - 0.45), y2 - headSize * Math.sin(ang - 0.45));
  c.lineTo(x2 - headSize * Math.cos(ang + 0.45), y2 - headSize * Math.sin(ang + 0.45));
  c.closePath();
  c.fill();
  c.restore();

  if (label) {
    const bias = 0.70;
    const mx = x1 + dx * bias, my = y1 + dy * bias;
    // Perpendicular offset, flipped so vertical arrows put the label on the right
    const side = dy > 0 ? -1 : 1;
    const nx = side * -dy / len * 18, ny = side * dx / len * 18;
    const metrics = measureLabel(c, label);
    drawLabel(c, label, mx + nx + Math.sign(nx) * metrics / 2, my + ny, color);
  }
}

function measureLabel(c: SKRSContext2D, text: string): number {
  c.save();
  c.font = LABEL_FONT;
  const w = c.measureText(text).width + 10;
  c.restore();
  return w;
}
