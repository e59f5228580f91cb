/**
 * Request body and query schemas.
 */

import { z } from "zod";

const isoDate = z
  .string()
  .datetime({ offset: true })
  .transform((value) => new Date(value));

const propertyValue = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const properties = z.record(propertyValue);

const booleanFlag = z
  .enum(["true", "false"])
  .transform((value) => value === "true");

export const calendarQuerySchema = z.object({
  user: z.string().min(1),
  activeOnly: booleanFlag.optional(),
  writableOnly: booleanFlag.optional(),
  /** Comma-separated backend names, in the order to list them */
  backends: z
    .string()
    .transform((value) => value.split(",").filter((name) => name.length > 0))
    .optional(),
});

export const createCalendarSchema = z
  .object({
    backend: z.string().min(1),
    uri: z.string().min(1),
    owner: z.string().min(1),
    displayName: z.string(),
    properties: properties.optional(),
    isActive: z.boolean().optional(),
  })
  .strict();

export const calendarPatchSchema = z
  .object({
    displayName: z.string().optional(),
    properties: properties.optional(),
    isActive: z.boolean().optional(),
  })
  .strict();

export const mergeSchema = z
  .object({
    sources: z.array(z.string().min(1)).min(1),
  })
  .strict();

export const periodQuerySchema = z
  .object({
    start: isoDate.optional(),
    end: isoDate.optional(),
  })
  .refine((period) => (period.start === undefined) === (period.end === undefined), {
    message: "start and end must be given together",
  });

const objectKind = z.enum(["event", "journal", "todo"]);

export const createObjectSchema = z
  .object({
    uid: z.string().min(1).optional(),
    kind: objectKind.default("event"),
    start: isoDate.nullable().default(null),
    end: isoDate.nullable().default(null),
    properties: properties.default({}),
  })
  .strict();

export const objectPatchSchema = z
  .object({
    kind: objectKind.optional(),
    start: isoDate.nullable().optional(),
    end: isoDate.nullable().optional(),
    properties: properties.optional(),
  })
  .strict();

export const moveSchema = z
  .object({
    destination: z.string().min(1),
  })
  .strict();
