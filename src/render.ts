// ═══════════════════════════════════════════════════════════════
//  Image renderer: PNG snapshots of single motion states
// ═══════════════════════════════════════════════════════════════

import { MARKER_STEP_M } from './constants';
import { prepCanvas } from './drawing';
import { heightToY, renderBallView, type BallViewStyle } from './views/ballView';
import type { TaskConfig } from './config';
import type { FrameRole, ImageRenderer, MotionState, SimulationParameters } from './types';

export interface RendererOptions extends BallViewStyle {
  width: number;
  height: number;
}

export class CanvasImageRenderer implements ImageRenderer<Buffer> {
  readonly options: RendererOptions;

  constructor(options: RendererOptions) {
    this.options = options;
  }

  static fromConfig(config: TaskConfig): CanvasImageRenderer {
    const [width, height] = config.imageSize;
    return new CanvasImageRenderer({
      width,
      height,
      ballRadius: config.ballRadius,
      ballColor: config.ballColor,
      pixelsPerMeter: config.pixelsPerMeter,
      markerStep: MARKER_STEP_M,
      showGround: config.showGround,
      showHeightMarkers: config.showHeightMarkers,
      showVelocityArrow: config.showVelocityArrow,
      showGravityArrow: config.showGravityArrow,
    });
  }

  /** Canvas y of the ball centre for a state. */
  ballCenterY(state: MotionState, params: SimulationParameters): number {
    const { height, pixelsPerMeter, ballRadius } = this.options;
    return heightToY(state.height, params.groundHeight, height, pixelsPerMeter) - ballRadius;
  }

  /** The whole ball disc lies inside the canvas. */
  isVisible(state: MotionState, params: SimulationParameters): boolean {
    const y = this.ballCenterY(state, params);
    const r = this.options.ballRadius;
    return y - r >= 0 && y + r <= this.options.height;
  }

  render(state: MotionState, params: SimulationParameters, role: FrameRole): Buffer {
    const { canvas, c, w, h } = prepCanvas(this.options.width, this.options.height);
    renderBallView(c, w, h, state, params, role, this.options);
    return canvas.toBuffer('image/png');
  }
}
