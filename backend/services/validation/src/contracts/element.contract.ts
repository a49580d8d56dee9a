// backend/services/validation/src/contracts/element.contract.ts
/**
 * Architecture elements as delivered by the element catalog services.
 *
 * Notes:
 * - Input only; elements are never persisted here.
 * - `layer` may be omitted upstream; it is then derived from `type`.
 * - Unknown element types without an explicit layer are rejected.
 */
import { z } from "zod";
import { zLayer, type Layer } from "./common";

export const ELEMENT_TYPES_BY_LAYER: Readonly<Record<Layer, readonly string[]>> =
  {
    Motivation: ["goal", "driver", "constraint", "requirement", "assessment"],
    Business: [
      "capability",
      "business_function",
      "business_process",
      "business_role",
    ],
    Application: ["application_function", "application_service"],
    Technology: ["node", "device", "systemsoftware"],
    Implementation: ["workpackage", "gap", "plateau"],
  };

const layerByType = new Map<string, Layer>();
for (const layer of zLayer.options) {
  for (const type of ELEMENT_TYPES_BY_LAYER[layer]) layerByType.set(type, layer);
}

export function layerOfType(type: string): Layer | null {
  return layerByType.get(type) ?? null;
}

export const zRelationship = z.object({
  target_id: z.string().min(1),
  target_type: z.string().min(1),
  relationship_type: z.string().min(1),
});

export type Relationship = z.infer<typeof zRelationship>;

export const elementContract = z
  .object({
    id: z.string().min(1),
    type: z.string().min(1),
    name: z.string().default(""),
    layer: zLayer.optional(),
    properties: z.record(z.unknown()).default({}),
    relationships: z.array(zRelationship).default([]),
    last_modified: z.coerce.date().optional(),
    created_at: z.coerce.date().optional(),
  })
  .transform((el, ctx) => {
    const layer = el.layer ?? layerOfType(el.type);
    if (!layer) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Unknown element type "${el.type}" and no layer given`,
        path: ["type"],
      });
      return z.NEVER;
    }
    return { ...el, layer };
  });

export type ArchitectureElement = z.output<typeof elementContract>;
export type ArchitectureElementInput = z.input<typeof elementContract>;
