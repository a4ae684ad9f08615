// packages/core/src/trace.ts
// Render trace: returned by callers on ?debug=1

import type { GraphStats } from './types';

export interface RenderTimings {
  readMs: number;     // validation pass
  buildMs: number;    // graph assembly
  renderMs?: number;  // external layout engine, when called
}

export interface RenderTrace {
  timings: RenderTimings;
  stats?: GraphStats;
  renderer?: string;
  errorCode?: string; // mapped taxonomy code (VALIDATION/SCHEMA/ADAPTER/INTERNAL)
}
