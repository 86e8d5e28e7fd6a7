/**
 * Telemetry window contract: validation and freezing.
 */

import { z } from 'zod';
import type { TelemetrySample, TelemetryWindow } from '../types.js';

const nonNegative = z.number().finite().nonnegative();

export const telemetrySampleSchema = z.object({
  timestamp: z.number().int().nonnegative(),
  depth: nonNegative,
  wob: nonNegative,
  rpm: nonNegative,
  torque: nonNegative,
  standpipePressure: nonNegative,
  flowRate: nonNegative,
  mudDensity: nonNegative,
  rop: nonNegative.optional(),
  hookLoad: nonNegative.optional(),
  ecd: nonNegative.optional(),
});

export const telemetryWindowSchema = z
  .object({
    id: z.string().min(1),
    wellId: z.string().optional(),
    startTime: z.number().int().nonnegative(),
    endTime: z.number().int().nonnegative(),
    samples: z.array(telemetrySampleSchema).min(1, 'window has no samples'),
  })
  .superRefine((w, ctx) => {
    if (w.endTime < w.startTime) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'endTime precedes startTime', path: ['endTime'] });
    }
    let prev = -Infinity;
    w.samples.forEach((s, i) => {
      if (s.timestamp < prev) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'sample timestamps decrease', path: ['samples', i, 'timestamp'] });
      }
      if (s.timestamp < w.startTime || s.timestamp > w.endTime) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'sample outside window bounds', path: ['samples', i, 'timestamp'] });
      }
      prev = s.timestamp;
    });
  });

export type WindowValidation =
  | { ok: true; window: TelemetryWindow }
  | { ok: false; issues: string[] };

/** Validate an untrusted window. Issues are formatted as `path: message`. */
export function validateWindow(input: unknown): WindowValidation {
  const parsed = telemetryWindowSchema.safeParse(input);
  if (!parsed.success) {
    return {
      ok: false,
      issues: parsed.error.issues.map(i => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message)),
    };
  }
  return { ok: true, window: parsed.data };
}

/** Deep-freeze a window so no agent can mutate what the others read. */
export function freezeWindow(window: TelemetryWindow): TelemetryWindow {
  if (Object.isFrozen(window) && Object.isFrozen(window.samples)) return window;
  const samples: TelemetrySample[] = window.samples.map(s => Object.freeze({ ...s }));
  return Object.freeze({ ...window, samples: Object.freeze(samples) });
}
