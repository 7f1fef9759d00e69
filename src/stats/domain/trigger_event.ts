import { z } from "zod";

/**
 * Scheduled (EventBridge/CloudWatch) event. Only the id is used, as the
 * run's correlation id; the rest is passed through untouched.
 */
export const TriggerEventSchema = z
  .object({
    id: z.string().min(1),
    "detail-type": z.string().optional(),
    source: z.string().optional(),
    time: z.string().optional(),
  })
  .passthrough();

export type TriggerEvent = z.infer<typeof TriggerEventSchema>;

export function parseTriggerEvent(event: unknown): TriggerEvent {
  const parsed = TriggerEventSchema.safeParse(event);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join(".") || "event"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid trigger event: ${issues}`);
  }
  return parsed.data;
}
