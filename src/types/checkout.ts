import { z } from "zod";

export const CreateCheckoutInputSchema = z.object({
  subjectId: z.string().min(1),
  orderId: z.string().min(1),
  /** Major currency units, e.g. 14.99. */
  amount: z.number().positive(),
  currency: z.string().length(3),
  description: z.string().min(1)
});
export type CreateCheckoutInput = z.infer<typeof CreateCheckoutInputSchema>;
