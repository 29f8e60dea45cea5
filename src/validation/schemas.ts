import { z } from "zod";

const objectId = z.string().regex(/^[0-9a-f]{24}$/i, "must be a valid id");

const optionalText = z.string().trim().min(1).nullable().optional();

export const signupSchema = z.object({
  email: z.string().trim().email(),
  password: z.string().min(6, "password must be at least 6 characters"),
  name: z.string().trim().min(1),
  phone: z.string().trim().min(1).optional(),
});

export const loginSchema = z.object({
  email: z.string().trim().email(),
  password: z.string().min(1),
});

export const pageQuerySchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

export const productListQuerySchema = pageQuerySchema.extend({
  category: objectId.optional(),
});

export const categoryCreateSchema = z.object({
  title: z.string().trim().min(1),
  description: optionalText,
});

export const categoryUpdateSchema = categoryCreateSchema.partial();

export const productCreateSchema = z.object({
  sku: z.string().trim().min(1),
  name: z.string().trim().min(1),
  description: optionalText,
  imageUrl: z.string().trim().url().nullable().optional(),
  price: z
    .number()
    .nonnegative()
    .multipleOf(0.01, "price must have at most two decimal places"),
  stock: z.number().int().nonnegative().default(0),
  categoryId: objectId,
});

export const productUpdateSchema = productCreateSchema.partial();

export const addCartItemSchema = z.object({
  productId: objectId,
  quantity: z.number().int().min(1).default(1),
});

// Zero or less removes the line.
export const setCartQuantitySchema = z.object({
  quantity: z.number().int(),
});

export const updateOrderStatusSchema = z.object({
  status: z.string(),
});

export const webhookEnvelopeSchema = z.object({
  event: z.string().min(1),
  payload: z.record(z.unknown()).default({}),
});

// Razorpay sends an empty array instead of an object when notes are empty.
const notesSchema = z
  .union([z.record(z.union([z.string(), z.number()])), z.array(z.unknown())])
  .nullable()
  .optional();

export const paymentLinkPaidPayloadSchema = z.object({
  payment_link: z.object({
    entity: z.object({
      id: z.string(),
      status: z.string(),
      notes: notesSchema,
    }),
  }),
  payment: z
    .object({
      entity: z.object({
        id: z.string(),
      }),
    })
    .optional(),
});

export type PaymentLinkPaidPayload = z.infer<typeof paymentLinkPaidPayloadSchema>;
