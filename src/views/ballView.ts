// ═══════════════════════════════════════════════════════════════
//  Ball View: height × time snapshot of the falling ball
// ═══════════════════════════════════════════════════════════════

import type { SKRSContext2D } from '@napi-rs/canvas';

import {
  COLORS,
  GROUND_MARGIN_PX,
  GRAVITY_ARROW_PX,
  MIN_DRAWN_SPEED,
  VELOCITY_ARROW_MAX,
} from '../constants';
import { drawArrow, drawLabel, rgbColor, type RGB } from '../drawing';
import type { FrameRole, MotionState, SimulationParameters } from '../types';

export interface BallViewStyle {
  ballRadius: number;
  ballColor: RGB;
  pixelsPerMeter: number;
  markerStep: number;
  showGround: boolean;
  showHeightMarkers: boolean;
  showVelocityArrow: boolean;
  showGravityArrow: boolean;
}

/** Canvas y of a world height: ground line sits GROUND_MARGIN_PX above the bottom. */
export function heightToY(
  height: number, groundHeight: number, canvasH: number, pixelsPerMeter: number,
): number {
  return canvasH - GROUND_MARGIN_PX - (height - groundHeight) * pixelsPerMeter;
}

export function renderBallView(
  c: SKRSContext2D,
  w: number,
  h: number,
  state: MotionState,
  params: SimulationParameters,
  role: FrameRole,
  style: BallViewStyle,
): void {
  const sc = style.pixelsPerMeter;
  const toY = (wz: number) => heightToY(wz, params.groundHeight, h, sc);
  const groundY = toY(params.groundHeight);
  const cx = w / 2;

  // Background
  c.fillStyle = COLORS.background;
  c.fillRect(0, 0, w, h);

  // Height markers
  if (style.showHeightMarkers) {
    c.save();
    c.setLineDash([4, 6]);
    c.strokeStyle = COLORS.marker;
    c.lineWidth = 1;
    c.fillStyle = COLORS.markerText;
    c.font = '13px sans-serif';
    c.textAlign = 'left';
    for (let m = style.markerStep; toY(params.groundHeight + m) >= 0; m += style.markerStep) {
      const y = toY(params.groundHeight + m);
      c.beginPath();
      c.moveTo(44, y);
      c.lineTo(w, y);
      c.stroke();
      c.fillText(m + 'm', 6, y + 4);
    }
    c.restore();
  }

  // Ground
  if (style.showGround) {
    c.fillStyle = COLORS.groundFill;
    c.fillRect(0, groundY, w, h - groundY);
    c.strokeStyle = COLORS.ground;
    c.lineWidth = 3;
    c.beginPath();
    c.moveTo(0, groundY);
    c.lineTo(w, groundY);
    c.stroke();
  }

  // Ball: resting on the ground means its bottom touches the line
  const by = toY(state.height) - style.ballRadius;
  c.beginPath();
  c.arc(cx, by, style.ballRadius, 0, Math.PI * 2);
  c.fillStyle = rgbColor(style.ballColor);
  c.fill();
  c.lineWidth = 2;
  c.strokeStyle = rgbColor(style.ballColor, 0.35);
  c.stroke();

  // Initial velocity (first frame only)
  if (role === 'first' && style.showVelocityArrow && Math.abs(state.velocity) >= MIN_DRAWN_SPEED) {
    const len = Math.min(VELOCITY_ARROW_MAX, 12 * Math.abs(state.velocity) + 20);
    const dir = state.velocity > 0 ? -1 : 1;
    const ax = cx + style.ballRadius + 28;
    drawArrow(c, ax, by, ax, by + dir * len, COLORS.velocity,
      'v = ' + state.velocity.toFixed(1) + ' m/s');
  }

  // Gravity
  if (style.showGravityArrow) {
    const gx = w - 70, gy = 36;
    drawArrow(c, gx, gy, gx, gy + GRAVITY_ARROW_PX, COLORS.gravity, null, 9);
    drawLabel(c, 'g = ' + params.gravity.toFixed(1) + ' m/s²', gx, gy + GRAVITY_ARROW_PX + 24,
      COLORS.gravity);
  }

  // Readout (margin text)
  c.fillStyle = COLORS.readout;
  c.font = '14px sans-serif';
  c.textAlign = 'left';
  c.fillText('t = ' + state.time.toFixed(2) + ' s', 56, 24);
  c.fillText('h = ' + (state.height - params.groundHeight).toFixed(2) + ' m', 56, 44);
}
