import { z } from 'zod';

const shippingAddressSchema = z.object({
  line1: z.string().trim().min(1, 'line1 is required'),
  line2: z.string().trim().optional(),
  city: z.string().trim().min(1, 'city is required'),
  state: z.string().trim().min(1, 'state is required'),
  postalCode: z.string().trim().min(1, 'postalCode is required'),
  country: z.string().trim().min(2, 'country is required'),
});

/**
 * Checkout body. Amounts, prices and line items are not accepted; the order
 * total comes from the cart and the catalog. Unknown keys such as `amount`
 * are stripped.
 */
export const checkoutSchema = z.object({
  shippingAddress: shippingAddressSchema.optional(),
  customerNotes: z.string().trim().max(500, 'customerNotes must be 500 characters or fewer').optional(),
});

export type CheckoutPayload = z.infer<typeof checkoutSchema>;
