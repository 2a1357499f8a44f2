import { z } from "zod";

const latSchema = z.number().min(-90).max(90);
const lngSchema = z.number().min(-180).max(180);

export const coordinateSchema = z.object({ lat: latSchema, lng: lngSchema });

/** A point given either as coordinates or as text to geocode */
export const pointInputSchema = z.union([
  z.object({
    lat: latSchema,
    lng: lngSchema,
    label: z.string().trim().min(1).max(200).optional(),
  }),
  z.object({
    address: z.string().trim().min(1).max(300),
    label: z.string().trim().min(1).max(200).optional(),
  }),
]);

export const planningOverridesSchema = z.object({
  chunkSize: z.number().int().min(2).max(25).optional(),
  connectLegs: z.boolean().optional(),
});

export const optimizeRouteBodySchema = z.object({
  depot: pointInputSchema,
  stops: z.array(pointInputSchema).max(1000),
  options: planningOverridesSchema.optional(),
});

export const sessionRouteBodySchema = z.object({
  stops: z.array(pointInputSchema).max(1000),
  options: planningOverridesSchema.optional(),
});

export const setDepotBodySchema = pointInputSchema;

export const chatMessageBodySchema = z
  .object({
    text: z.string().max(10_000).optional(),
    location: coordinateSchema.optional(),
  })
  .refine((v) => v.text !== undefined || v.location !== undefined, {
    message: "text or location is required",
  });

export const userIdSchema = z.string().trim().min(1).max(128);

export type PointInput = z.infer<typeof pointInputSchema>;
export type PlanningOverrides = z.infer<typeof planningOverridesSchema>;
export type OptimizeRouteRequest = z.infer<typeof optimizeRouteBodySchema>;
export type SessionRouteRequest = z.infer<typeof sessionRouteBodySchema>;
export type ChatMessageRequest = z.infer<typeof chatMessageBodySchema>;
