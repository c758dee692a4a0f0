import { Request, Response, NextFunction } from "express";
import { z, ZodSchema, ZodError } from "zod";

/** Maximum notification text length. The bot splits anything over 4096 characters into several chat messages. */
export const MAX_MESSAGE_LENGTH = 20_000;

const METADATA_MAX_CHARS = 20_000;

const metadataSchema = z
  .record(z.unknown())
  .refine((value) => JSON.stringify(value).length <= METADATA_MAX_CHARS, {
    message: `metadata exceeds ${METADATA_MAX_CHARS} characters when serialized`,
  });

const externalId = z.string().trim().min(1).max(200);
const platformId = z.union([z.string().trim().min(1).max(64), z.number().int()]).transform(String);

/**
 * Validation middleware factory
 * Validates request body and params against Zod schemas
 */
export function validate(schemas: {
  body?: ZodSchema;
  params?: ZodSchema;
}) {
  return async (req: Request, res: Response, next: NextFunction) => {
    try {
      if (schemas.body) {
        req.body = await schemas.body.parseAsync(req.body ?? {});
      }
      if (schemas.params) {
        req.params = await schemas.params.parseAsync(req.params);
      }
      next();
    } catch (error) {
      if (error instanceof ZodError) {
        res.status(400).json({
          success: false,
          error: {
            code: "VALIDATION_ERROR",
            message: "Invalid request data",
            details: error.errors.map((e) => ({
              path: e.path.join("."),
              message: e.message,
            })),
          },
        });
        return;
      }
      next(error);
    }
  };
}

export const schemas = {
  register: z.object({
    platformUserId: platformId,
    chatId: platformId,
    displayName: z.string().trim().max(200).optional(),
  }),

  revoke: z.object({
    platformUserId: platformId,
  }),

  platformUserParam: z.object({
    platformUserId: z.string().trim().min(1).max(64),
  }),

  setMuted: z.object({
    muted: z.boolean(),
  }),

  notify: z.object({
    message: z.string().trim().min(1, "Message is required").max(MAX_MESSAGE_LENGTH),
    metadata: metadataSchema.nullish().transform((value) => value ?? undefined),
  }),

  startProcess: z.object({
    processId: externalId,
    name: z.string().trim().min(1).max(200),
    metadata: metadataSchema.optional(),
    parentId: externalId.optional(),
  }),

  endProcess: z.object({
    processId: externalId,
    status: z.enum(["completed", "error"]),
    metadata: metadataSchema.optional(),
  }),

  heartbeat: z.object({
    processId: externalId.optional(),
    metadata: metadataSchema.optional(),
  }),
};

export type RegisterBody = z.infer<typeof schemas.register>;
export type NotifyBody = z.infer<typeof schemas.notify>;
export type StartProcessBody = z.infer<typeof schemas.startProcess>;
export type EndProcessBody = z.infer<typeof schemas.endProcess>;
export type HeartbeatBody = z.infer<typeof schemas.heartbeat>;
