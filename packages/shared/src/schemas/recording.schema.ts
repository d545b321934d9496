import { z } from 'zod';

export const recordingActionSchema = z.object({
  action: z.enum(['start', 'stop', 'reset']),
});

export const captureTimestampSchema = z.object({
  elapsed_seconds: z.number().int().min(0).optional(),
});

export type RecordingAction = z.infer<typeof recordingActionSchema>['action'];
export type CaptureTimestampInput = z.infer<typeof captureTimestampSchema>;
