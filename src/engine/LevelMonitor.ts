/**
 * LevelMonitor — windowed hysteresis between Active and Standby.
 *
 * A single loud or quiet reading never flips the mode: it takes
 * `standbyWindow` consecutive readings below `silenceThreshold` to enter
 * Standby and `activityWindow` consecutive readings above
 * `activityThreshold` to leave it. Readings between the two thresholds
 * leave both counters untouched.
 */

import type { ActivityMode, ActivityState } from '../types/session.js';

export interface LevelMonitorOptions {
  silenceThreshold: number;
  activityThreshold: number;
  activityWindow: number;
  standbyWindow: number;
}

export interface ActivityUpdate {
  state: ActivityState;
  changed: boolean;
}

export function createActivityState(mode: ActivityMode = 'standby'): ActivityState {
  return { mode, consecutiveBelowThreshold: 0, consecutiveAboveThreshold: 0 };
}

export function updateActivity(
  state: ActivityState,
  level: number,
  opts: LevelMonitorOptions,
): ActivityUpdate {
  if (level < opts.silenceThreshold) {
    const below = state.consecutiveBelowThreshold + 1;
    const enterStandby = state.mode === 'active' && below >= opts.standbyWindow;
    return {
      state: {
        mode: enterStandby ? 'standby' : state.mode,
        consecutiveBelowThreshold: below,
        consecutiveAboveThreshold: 0,
      },
      changed: enterStandby,
    };
  }

  if (level > opts.activityThreshold) {
    const above = state.consecutiveAboveThreshold + 1;
    const exitStandby = state.mode === 'standby' && above >= opts.activityWindow;
    return {
      state: {
        mode: exitStandby ? 'active' : state.mode,
        consecutiveBelowThreshold: 0,
        consecutiveAboveThreshold: above,
      },
      changed: exitStandby,
    };
  }

  return { state: { ...state }, changed: false };
}
