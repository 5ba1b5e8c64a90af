import type { ExportSnapshot } from '../capsule/snapshot.js'
import type { SingleShotMode } from './cloud.js'

const MODE_INSTRUCTIONS: Record<SingleShotMode, string> = {
  reflect: `Write a short contemplation in three parts:
1. What you hear: a plain restatement of what matters in the text.
2. What might be underneath: one gentle observation, offered as a possibility.
3. A next small step: one concrete, optional action.`,
  perspective: `Offer three distinct perspectives on the situation, each in two or three sentences.
Label them "Perspective 1", "Perspective 2" and "Perspective 3". Do not pick a winner.`,
  options: `List four practical options the person could take next, as a numbered list.
Each option gets one line of what it is and one line of what it costs.`,
  questions: `Ask three open questions that would help the person think this through.
Number them. No advice, no answers.`
}

const GROUND_RULES = `You are a calm, plain-spoken reflection aid, not a therapist.
Do not diagnose. Do not use clinical or therapy language. Keep it under 200 words.
Placeholders in square brackets such as [EMAIL] or [CUSTOM] stand for removed details; never guess what they were.`

function describePreferences(snapshot: ExportSnapshot | undefined): string {
  if (!snapshot) return ''

  const lines: string[] = []
  for (const [key, value] of Object.entries(snapshot.preferences)) {
    lines.push(`- ${key}: ${value}`)
  }
  for (const cue of snapshot.learnedCues ?? []) {
    lines.push(`- tends to: ${cue.statement}`)
  }
  return lines.length > 0 ? `\nPreferences to respect:\n${lines.join('\n')}\n` : ''
}

export function buildContemplationPrompt(mode: SingleShotMode, text: string, snapshot?: ExportSnapshot): string {
  return `${GROUND_RULES}

${MODE_INSTRUCTIONS[mode]}
${describePreferences(snapshot)}
Text:
"""
${text}
"""`
}
