/**
 * Zod Validation Schemas
 *
 * Runtime validation for everything that crosses a process boundary:
 * the lexicon file read at startup, aggregate state read back from Postgres,
 * HTTP request bodies/params, and LLM provider JSON.
 *
 * Usage:
 *   const result = ChatRequestSchema.safeParse(request.body)
 *   if (!result.success) throw new InputError(...)
 *   return result.data.user_id   // Type-safe
 */

import { z } from 'zod'

// ═══════════════════════════════════════════════════════════════════════════
// 1. LEXICON FILE — data/lexicon.json
// ═══════════════════════════════════════════════════════════════════════════

const TermListSchema = z.array(z.string().trim().min(1)).default([])

/**
 * Expected: { crisis: { imminent, severe, moderate }, sentiment: { positive, negative }, topics: { label: [terms] } }
 * Missing groups default to empty lists so a partial file still loads.
 */
export const LexiconFileSchema = z.object({
    version: z.number().int().optional(),
    crisis: z.object({
        imminent: TermListSchema,
        severe: TermListSchema,
        moderate: TermListSchema,
    }).default({}),
    sentiment: z.object({
        positive: TermListSchema,
        negative: TermListSchema,
    }).default({}),
    topics: z.record(z.string().min(1), TermListSchema).default({}),
})

export type LexiconFile = z.infer<typeof LexiconFileSchema>

// ═══════════════════════════════════════════════════════════════════════════
// 2. AGGREGATE STATE — user_context_aggregates.state / messages.analysis
// ═══════════════════════════════════════════════════════════════════════════

export const MessageAnalysisSchema = z.object({
    isCrisis: z.boolean(),
    urgencyLevel: z.enum(['low', 'medium', 'high', 'critical']),
    crisisTier: z.enum(['moderate', 'severe', 'imminent']).nullable(),
    isNegative: z.boolean(),
    isPositive: z.boolean(),
    messageLength: z.number().int().nonnegative(),
    hasQuestion: z.boolean(),
    topics: z.array(z.string()),
})

export const AggregateStateSchema = z.object({
    userId: z.string().min(1),
    totalMessages: z.number().int().nonnegative(),
    lastTimestamp: z.string().nullable(),
    sentimentWindow: z.array(z.boolean()),
    topicCounts: z.record(z.string(), z.object({
        count: z.number().int().positive(),
        lastSeq: z.number().int().positive(),
    })),
    crisisEvents: z.object({
        count: z.number().int().nonnegative(),
        lastAt: z.string().nullable(),
    }),
    recentActivity: z.array(z.string()),
})

// ═══════════════════════════════════════════════════════════════════════════
// 3. HTTP — request bodies, params, query strings
// ═══════════════════════════════════════════════════════════════════════════

export const UserIdSchema = z.string().trim().min(1, 'user_id must not be empty').max(128)

/**
 * POST /chat
 * Expected: { "user_id": "...", "message": "..." }
 */
export const ChatRequestSchema = z.object({
    user_id: UserIdSchema,
    message: z.string().trim().min(1, 'message must not be empty').max(4000),
})

export type ChatRequest = z.infer<typeof ChatRequestSchema>

export const UserParamsSchema = z.object({
    userId: UserIdSchema,
})

export const HistoryQuerySchema = z.object({
    limit: z.coerce.number().int().min(1).max(100).default(20),
})

// ═══════════════════════════════════════════════════════════════════════════
// 4. GEMINI — generateContent response
// ═══════════════════════════════════════════════════════════════════════════

export const GeminiResponseSchema = z.object({
    candidates: z.array(z.object({
        content: z.object({
            parts: z.array(z.object({ text: z.string().optional() })).default([]),
        }).optional(),
    })).default([]),
})

// ═══════════════════════════════════════════════════════════════════════════
// UTILITIES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Safely parse a JSON string with a Zod schema.
 * Returns the parsed+validated data or null on any failure.
 */
export function safeParseJson<T extends z.ZodTypeAny>(
    raw: string | null | undefined,
    schema: T,
    label: string,
): z.infer<T> | null {
    if (!raw) return null

    let parsed: unknown
    try {
        parsed = JSON.parse(raw)
    } catch (err) {
        console.warn(`[schemas] ${label}: JSON parse failed:`, err)
        return null
    }

    const result = schema.safeParse(parsed)
    if (result.success) {
        return result.data
    }
    console.warn(`[schemas] ${label}: validation failed:`, result.error.issues)
    return null
}
