// file: src/modules/pricing/pricing.schema.ts

import { z } from "zod";

import { objectIdSchema } from "@/utils/validators.utils";

import { PRICING_BLOCK_KINDS, SEMANTIC_KEYS } from "./pricing.interface";

const quantityOptionSchema = z
  .object({
    name: z.string().trim().min(1).max(120),
    unitPrice: z.number().nonnegative(),
    minQuantity: z.number().int().nonnegative().default(1),
    maxQuantity: z.number().int().positive().default(100),
    unitName: z.string().trim().min(1).max(60),
  })
  .refine((option) => option.minQuantity <= option.maxQuantity, {
    message: "minQuantity must not exceed maxQuantity",
    path: ["minQuantity"],
  });

const typeOptionSchema = z
  .object({
    name: z.string().trim().min(1).max(120),
    options: z
      .array(
        z.object({
          name: z.string().trim().min(1).max(120),
          price: z.number().nonnegative(),
        })
      )
      .min(1),
  })
  .refine(
    (option) =>
      new Set(option.options.map((choice) => choice.name)).size ===
      option.options.length,
    { message: "Option names must be unique", path: ["options"] }
  );

const toggleOptionSchema = z.object({
  name: z.string().trim().min(1).max(120),
  shortDescription: z.string().trim().min(1).max(250),
  fullDescription: z.string().trim().max(2000).optional(),
  percentageIncrease: z.number().nonnegative().max(1000),
});

const PAYLOAD_BY_KIND = {
  quantity: "quantityOption",
  type_choice: "typeOption",
  toggle: "toggleOption",
} as const;

const payloadFields = {
  quantityOption: quantityOptionSchema.optional(),
  typeOption: typeOptionSchema.optional(),
  toggleOption: toggleOptionSchema.optional(),
};

type PayloadFields = {
  quantityOption?: unknown;
  typeOption?: unknown;
  toggleOption?: unknown;
};

function presentPayloads(body: PayloadFields) {
  return Object.values(PAYLOAD_BY_KIND).filter(
    (field) => body[field] !== undefined
  );
}

export const serviceParamSchema = z.object({
  params: z.object({
    serviceId: objectIdSchema,
  }),
});

export const blockParamSchema = z.object({
  params: z.object({
    blockId: objectIdSchema,
  }),
});

export const createPricingBlockSchema = z.object({
  params: z.object({
    serviceId: objectIdSchema,
  }),
  body: z
    .object({
      name: z.string().trim().min(1).max(120),
      kind: z.enum(PRICING_BLOCK_KINDS),
      semanticKey: z.enum(SEMANTIC_KEYS).default("custom"),
      order: z.number().int().nonnegative().default(0),
      isRequired: z.boolean().default(true),
      ...payloadFields,
    })
    .superRefine((body, ctx) => {
      const expected = PAYLOAD_BY_KIND[body.kind];
      const present = presentPayloads(body);

      if (present.length !== 1 || present[0] !== expected) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `A ${body.kind} block takes exactly one ${expected} payload`,
          path: [expected],
        });
      }
    }),
});

export const updatePricingBlockSchema = z.object({
  params: z.object({
    blockId: objectIdSchema,
  }),
  body: z
    .object({
      name: z.string().trim().min(1).max(120).optional(),
      semanticKey: z.enum(SEMANTIC_KEYS).optional(),
      order: z.number().int().nonnegative().optional(),
      isRequired: z.boolean().optional(),
      isActive: z.boolean().optional(),
      ...payloadFields,
    })
    .superRefine((body, ctx) => {
      if (presentPayloads(body).length > 1) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: "Only one option payload may be replaced at a time",
        });
      }
    }),
});

export const reorderPricingBlocksSchema = z.object({
  params: z.object({
    serviceId: objectIdSchema,
  }),
  body: z.object({
    blocks: z
      .array(
        z.object({
          blockId: objectIdSchema,
          order: z.number().int().nonnegative(),
        })
      )
      .min(1),
  }),
});

export const pricingSelectionSchema = z.object({
  blockId: objectIdSchema,
  quantity: z.number().int().nonnegative().optional(),
  selectedType: z.string().trim().min(1).optional(),
  enabled: z.boolean().optional(),
});

export const pricingPreviewSchema = z.object({
  params: z.object({
    serviceId: objectIdSchema,
  }),
  body: z.object({
    selections: z.array(pricingSelectionSchema).default([]),
  }),
});
