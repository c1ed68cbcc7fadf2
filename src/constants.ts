// ═══════════════════════════════════════════════════════════════
//  Global constants
// ═══════════════════════════════════════════════════════════════

// ── Simulation defaults ──────────────────────────────────────
export const DEFAULT_SAMPLE_RATE      = 60;      // Hz
export const DEFAULT_RESTITUTION      = 0.7;
export const DEFAULT_FRICTION_DAMPING = 0.1;
export const DEFAULT_GROUND_HEIGHT    = 0;       // m
export const REST_VELOCITY_EPSILON    = 0.05;    // m/s
export const REST_HEIGHT_EPSILON      = 0.001;   // m

// ── Canvas layout ────────────────────────────────────────────
export const GROUND_MARGIN_PX   = 60;    // ground line distance from bottom edge
export const MARKER_STEP_M      = 5;     // height-marker spacing
export const VELOCITY_ARROW_MAX = 120;   // px, longest velocity arrow
export const GRAVITY_ARROW_PX   = 50;
export const MIN_DRAWN_SPEED    = 0.05;  // m/s, below this no velocity arrow

// ── Palette ─────────────────────────────────────────────────
export const COLORS = {
  background: '#0d1117',
  ground:     '#3fb950',
  groundFill: '#1b2a1b',
  marker:     '#30363d',
  markerText: '#8b949e',
  velocity:   '#58a6ff',
  gravity:    '#f0883e',
  readout:    '#c9d1d9',
} as const;
