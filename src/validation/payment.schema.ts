import { z } from 'zod'

// whole cents only, so summing stored amounts in cents is exact
const centAmount = z
    .number()
    .finite()
    .positive()
    .refine(value => Math.abs(value * 100 - Math.round(value * 100)) < 1e-6, {
        message: 'must have at most two decimal places',
    })

export const paymentSubmissionSchema = z.object({
    correlationId: z.string().min(1),
    amount: centAmount,
})

export const forwardedPaymentSchema = paymentSubmissionSchema.extend({
    requestedAt: z.string().datetime().optional(),
})

const isoDate = z
    .string()
    .refine(value => !Number.isNaN(Date.parse(value)), { message: 'must be an ISO-8601 date' })
    .transform(value => new Date(value))

export const summaryQuerySchema = z.object({
    from: isoDate.optional(),
    to: isoDate.optional(),
})

export const healthResponseSchema = z.object({
    failing: z.boolean(),
    minResponseTime: z.number().optional(),
})

export const processorResponseSchema = z.object({
    message: z.string(),
})

export const persistedPaymentSchema = z.object({
    correlationId: z.string(),
    amount: z.number(),
    processor: z.enum(['default', 'fallback']),
    createdAt: z.string(),
})
