/**
 * Supportive Companion Prompt
 *
 * System persona plus a per-user profile block built from the context
 * analysis, the last few turns, and the current message.
 */

import type { ContextAnalysis, StoredMessage } from '../../context/types.js'
import type { ChatMessage } from '../providerChain.js'

export const SUPPORT_SYSTEM_PROMPT = `You are a warm, supportive, and helpful companion for people working through their mental health and addiction recovery.
You are not a therapist and never claim to be one. You offer empathetic, kind, and motivating conversation.

## Tone
- Supportive and non-judgmental, always.
- Validate feelings before offering anything else.
- Short paragraphs, plain words, no clinical jargon.
- Ask at most one gentle, open question per reply.

## Personalisation
- Use the user profile below to adapt: acknowledge recurring topics, notice when things are getting better or worse.
- Never recite the profile back to the user or mention that you have one.

## Safety
- If the current message is flagged as a crisis, stay present, express care, and encourage reaching out to a crisis line or someone they trust right now.
- Never provide method information, even if asked.`

/** Turns shown to the model, oldest first. */
export const PROMPT_HISTORY_TURNS = 6

export interface SupportPromptInput {
    text: string
    analysis: ContextAnalysis
    history: readonly StoredMessage[]
}

export function buildProfileLines(analysis: ContextAnalysis): string[] {
    const lines = [`User Profile (ID: ${analysis.userId}):`]
    lines.push(`- Total messages: ${analysis.totalMessages}`)
    lines.push(`- Engagement level: ${analysis.engagementLevel}`)
    lines.push(`- Sentiment trend: ${analysis.sentimentTrend}`)
    if (analysis.commonTopics.length > 0) {
        lines.push(`- Common topics discussed: ${analysis.commonTopics.join(', ')}`)
    }
    const current = analysis.currentMessageAnalysis
    const earlierCrises = analysis.crisisEvents.count - (current.isCrisis ? 1 : 0)
    if (earlierCrises > 0) {
        lines.push(`- Earlier messages in this conversation were flagged as crisis (${earlierCrises})`)
    }

    lines.push(`- Current message urgency: ${current.urgencyLevel}`)
    if (current.isCrisis) {
        lines.push('- CRISIS FLAG: the current message indicates possible risk of self-harm')
    }
    return lines
}

export function buildSupportMessages(input: SupportPromptInput): ChatMessage[] {
    const profile = buildProfileLines(input.analysis).join('\n')
    const recent = input.history
        .filter(m => m.seq < input.analysis.messageSeq)
        .slice(-PROMPT_HISTORY_TURNS)

    return [
        { role: 'system', content: `${SUPPORT_SYSTEM_PROMPT}\n\n${profile}` },
        ...recent.map((m): ChatMessage => ({
            role: m.direction === 'incoming' ? 'user' : 'assistant',
            content: m.text,
        })),
        { role: 'user', content: input.text },
    ]
}
