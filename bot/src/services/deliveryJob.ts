import { z } from "zod";

/** Body of POST /deliver, as sent by the backend's delivery worker. */
export const deliveryJobSchema = z.object({
  notificationId: z.string().min(1),
  chatId: z.union([z.string().min(1), z.number().int()]).transform(String),
  kind: z.enum(["message", "process_started", "process_ended"]),
  message: z.string(),
  metadata: z.record(z.unknown()).nullable().default(null),
  process: z
    .object({
      processId: z.string(),
      name: z.string(),
      status: z.enum(["started", "running", "completed", "error"]),
      durationSeconds: z.number().nonnegative().optional(),
    })
    .optional(),
});

export type DeliveryJob = z.infer<typeof deliveryJobSchema>;
