/**
 * Provider Chain — response generation with fallback
 *
 * Chain: Groq (configured model) → Gemini (configured model)
 *
 * Each provider retries its own transient failures (withLlmRetry). When a
 * provider still fails, or answers with nothing, the next one is tried. When
 * every provider is exhausted the chain answers `{ text: '', provider: 'none' }`
 * and the caller decides on a fallback reply.
 */

import Groq from 'groq-sdk'
import type { AppConfig } from '../config.js'
import { GeminiResponseSchema, safeParseJson } from '../types/schemas.js'
import { withLlmRetry } from '../utils/retry.js'
import { safeError } from '../utils/safe-log.js'

// ─── Types ──────────────────────────────────────────────────────────────────

export interface ChatMessage {
    role: 'system' | 'user' | 'assistant'
    content: string
}

export interface CallOptions {
    maxTokens?: number
    temperature?: number
}

export interface LLMProvider {
    name: string
    call: (messages: ChatMessage[], opts: CallOptions) => Promise<string>
}

export interface ProviderResult {
    text: string
    provider: string
}

type FetchLike = (input: string, init: { method: string; headers: Record<string, string>; body: string }) => Promise<{
    ok: boolean
    status: number
    text(): Promise<string>
}>

// ─── Provider Factories ─────────────────────────────────────────────────────

export function makeGroqProvider(apiKey: string, model: string): LLMProvider {
    const client = new Groq({ apiKey })
    return {
        name: `groq:${model}`,
        call: async (messages, opts) => {
            const completion = await withLlmRetry(
                () => client.chat.completions.create({
                    model,
                    messages: messages.map(m => ({ role: m.role, content: m.content })),
                    max_tokens: opts.maxTokens ?? 800,
                    temperature: opts.temperature ?? 0.7,
                }),
                `groq:${model}`,
            )
            return completion.choices[0]?.message?.content ?? ''
        },
    }
}

export function makeGeminiProvider(apiKey: string, model: string, fetchImpl: FetchLike = fetch): LLMProvider {
    return {
        name: `gemini:${model}`,
        call: async (messages, opts) => {
            const systemMsg = messages.find(m => m.role === 'system')
            const contents = messages
                .filter(m => m.role !== 'system')
                .map(m => ({
                    role: m.role === 'assistant' ? 'model' : 'user',
                    parts: [{ text: m.content }],
                }))

            const body = {
                contents,
                generationConfig: {
                    maxOutputTokens: opts.maxTokens ?? 800,
                    temperature: opts.temperature ?? 0.7,
                    topP: 1,
                    topK: 1,
                },
                ...(systemMsg ? { systemInstruction: { parts: [{ text: systemMsg.content }] } } : {}),
            }

            const url = `https://generativelanguage.googleapis.com/v1beta/models/${model}:generateContent?key=${apiKey}`
            const raw = await withLlmRetry(async () => {
                const resp = await fetchImpl(url, {
                    method: 'POST',
                    headers: { 'Content-Type': 'application/json' },
                    body: JSON.stringify(body),
                })
                const text = await resp.text()
                if (!resp.ok) {
                    throw Object.assign(new Error(`Gemini ${resp.status}: ${text.slice(0, 200)}`), { status: resp.status })
                }
                return text
            }, `gemini:${model}`)

            const data = safeParseJson(raw, GeminiResponseSchema, 'gemini')
            const parts = data?.candidates[0]?.content?.parts ?? []
            return parts.map(part => part.text ?? '').join('')
        },
    }
}

/** Providers for which credentials are configured, in fallback order. */
export function buildProviders(llm: AppConfig['llm']): LLMProvider[] {
    const providers: LLMProvider[] = []
    if (llm.groqApiKey) providers.push(makeGroqProvider(llm.groqApiKey, llm.groqModel))
    if (llm.geminiApiKey) providers.push(makeGeminiProvider(llm.geminiApiKey, llm.geminiModel))
    if (providers.length === 0) {
        console.warn('[LLM] No provider credentials configured; replies will use the fallback text')
    }
    return providers
}

// ─── Core: Call with Fallback ───────────────────────────────────────────────

export class ProviderChain {
    constructor(private readonly providers: readonly LLMProvider[]) {}

    get providerNames(): string[] {
        return this.providers.map(p => p.name)
    }

    async generate(messages: ChatMessage[], opts: CallOptions = {}): Promise<ProviderResult> {
        for (const provider of this.providers) {
            try {
                console.log(`[LLM] Using ${provider.name}`)
                const text = (await provider.call(messages, opts)).trim()
                if (text) return { text, provider: provider.name }
                console.warn(`[LLM] ${provider.name} returned an empty reply, falling back`)
            } catch (err) {
                console.error(`[LLM] ${provider.name} failed, falling back:`, safeError(err))
            }
        }

        console.error('[LLM] All providers exhausted')
        return { text: '', provider: 'none' }
    }
}
