/**
 * Velocity Tracker
 *
 * Estimates release velocity from recent pointer samples.
 * Only samples inside the trailing window count, so a pause
 * before release reads as a slow release.
 */

import { PANEL_TIMING } from '../types/common';

interface Sample {
  position: number;
  time: number;
}

export class VelocityTracker {
  private samples: Sample[] = [];

  constructor(private readonly windowMs: number = PANEL_TIMING.velocitySampleWindow) {}

  /**
   * Record a position (any unit) at a time in milliseconds
   */
  addSample(position: number, time: number): void {
    if (!Number.isFinite(position) || !Number.isFinite(time)) return;

    const last = this.samples[this.samples.length - 1];
    if (last && time < last.time) {
      // Clock went backwards: start over
      this.samples = [];
    }

    this.samples.push({ position, time });
    this.prune(time);
  }

  /**
   * Velocity in units per second over the window ending at `now`
   * (defaults to the latest sample). 0 without two usable samples.
   */
  getVelocity(now?: number): number {
    const latest = this.samples[this.samples.length - 1];
    if (!latest) return 0;

    const end = now ?? latest.time;
    const recent = this.samples.filter((sample) => end - sample.time <= this.windowMs);
    if (recent.length < 2) return 0;

    const first = recent[0];
    const last = recent[recent.length - 1];
    const elapsed = last.time - first.time;
    if (elapsed <= 0) return 0;

    return ((last.position - first.position) / elapsed) * 1000;
  }

  reset(): void {
    this.samples = [];
  }

  get sampleCount(): number {
    return this.samples.length;
  }

  private prune(now: number): void {
    this.samples = this.samples.filter((sample) => now - sample.time <= this.windowMs);
  }
}
