/**
 * Ledgerwise - AI Context Builder
 *
 * Condenses the profile, features and scores into the summary the advisor
 * sees, and renders it into a system prompt. Only the summary leaves the
 * server; raw debts and free text beyond `goals` are never sent.
 */

import { calculateHealthScore } from './health-score'
import { riskBand } from './scoring'
import type { AdvisoryContext, AdvisoryExchange, DerivedFeatures, FinancialProfile, ProfileSummary, ScoreResult } from './types'

// ─── Types ────────────────────────────────────────────────────────────────

export interface ChatTurn {
  role: 'user' | 'assistant'
  content: string
}

export type QuestionTopic = 'vacation' | 'emergency' | 'home' | 'retirement' | 'debt' | 'investment' | 'insurance' | 'general'

export interface AdvisorPrompt {
  system: string
  user: string
  topic: QuestionTopic
}

export const MAX_HISTORY_TURNS = 6

// ─── Formatting ───────────────────────────────────────────────────────────

export function money(amount: number): string {
  const rounded = Math.round(amount)
  const sign = rounded < 0 ? '-' : ''
  return `${sign}$${Math.abs(rounded).toLocaleString('en-US')}`
}

export const pct = (fraction: number) => `${(fraction * 100).toFixed(1)}%`

// ─── Context ──────────────────────────────────────────────────────────────

export function buildAdvisoryContext(
  profile: FinancialProfile,
  features: DerivedFeatures,
  score: ScoreResult,
): AdvisoryContext {
  const summary: ProfileSummary = {
    monthlyIncome: features.monthlyIncome,
    monthlyExpenses: features.expenseRatio * features.monthlyIncome,
    monthlySavings: features.savingsRate * features.monthlyIncome,
    monthlySurplus: features.monthlySurplus,
    totalDebt: features.totalDebt,
    insuranceCoverage: profile.insuranceCoverage,
    emergencyFund: profile.emergencyFund ?? 0,
    investments: profile.investments ?? 0,
    age: profile.age,
    dependents: profile.dependents,
    healthScore: calculateHealthScore(features).overallScore,
  }
  if (profile.goals?.trim()) summary.goals = profile.goals.trim()
  return { profile: summary, score }
}

// ─── Topics ───────────────────────────────────────────────────────────────

const TOPIC_KEYWORDS: [QuestionTopic, RegExp][] = [
  ['vacation', /\b(vacation|trip|travel|holiday)\b/i],
  ['emergency', /\b(emergency|rainy.day|safety net)\b/i],
  ['home', /\b(house|home|property|mortgage|down payment)\b/i],
  ['retirement', /\b(retire|retirement|pension)\b/i],
  ['debt', /\b(debt|loan|credit card|repay|payoff|pay off)\b/i],
  ['insurance', /\b(insurance|insure|life cover|coverage)\b/i],
  ['investment', /\b(invest|investing|investment|stocks?|funds?|portfolio|sip)\b/i],
]

export function classifyTopic(question: string): QuestionTopic {
  for (const [topic, pattern] of TOPIC_KEYWORDS) {
    if (pattern.test(question)) return topic
  }
  return 'general'
}

const TOPIC_GUIDANCE: Record<QuestionTopic, string> = {
  vacation: 'Weigh the trip against the monthly surplus and the emergency fund. Suggest a savings timeline rather than new debt.',
  emergency: 'Target 3-6 months of expenses (more with dependents). Give a monthly amount and the months needed to reach it.',
  home: 'Consider down payment size, total debt load and how a mortgage changes the debt-to-income ratio.',
  retirement: 'Relate current savings and age to a retirement timeline. Mention employer plans and tax-advantaged accounts generically.',
  debt: 'Compare avalanche (highest rate first) and snowball orders using the weighted interest rate.',
  insurance: 'Use the insurance gap figure. Favour term life cover for dependents over investment-linked policies.',
  investment: 'Match allocation to investment readiness and risk. Emergency fund and high-interest debt come first.',
  general: 'Answer directly, then tie the advice back to the numbers above.',
}

// ─── Prompt ───────────────────────────────────────────────────────────────

export function describeContext(context: AdvisoryContext): string {
  const { profile: p, score: s } = context
  const lines = [
    `- Monthly income: ${money(p.monthlyIncome)}`,
    `- Monthly expenses: ${money(p.monthlyExpenses)}`,
    `- Monthly savings: ${money(p.monthlySavings)}`,
    `- Monthly surplus after savings: ${money(p.monthlySurplus)}`,
    `- Total debt: ${money(p.totalDebt)}`,
    `- Emergency fund: ${money(p.emergencyFund)}`,
    `- Investments: ${money(p.investments)}`,
    `- Insurance coverage: ${money(p.insuranceCoverage)}`,
    `- Age: ${p.age}, dependents: ${p.dependents}`,
    `- Health score: ${p.healthScore}/100`,
    `- Risk score: ${s.riskScore.toFixed(2)} (${riskBand(s.riskScore)})`,
    `- Investment readiness: ${s.investmentReadiness.toFixed(2)}`,
    `- Insurance gap: ${money(s.insuranceGap)}`,
  ]
  if (p.goals) lines.push(`- Stated goals: ${p.goals}`)
  return lines.join('\n')
}

export function buildAdvisorPrompt(question: string, context: AdvisoryContext): AdvisorPrompt {
  const topic = classifyTopic(question)
  const system = `You are a personal finance advisor. You give practical, specific advice grounded in the user's own numbers.

USER FINANCIAL PROFILE:
${describeContext(context)}

GUIDELINES:
- Use the figures above; do not ask the user to repeat them.
- Give concrete amounts and timelines where possible.
- Keep the answer under 300 words, using short paragraphs or bullet points.
- Name specific products only generically (index funds, term life cover, high-yield savings).
- If the question is outside personal finance, say so briefly.
- ${TOPIC_GUIDANCE[topic]}`

  return { system, user: question.trim(), topic }
}

/** Last turns of history, trimmed to what the model needs */
export function recentHistory(history: ChatTurn[], maxTurns = MAX_HISTORY_TURNS): ChatTurn[] {
  return history.filter(t => t.content.trim()).slice(-maxTurns)
}

/** Recorded exchanges as chat turns, limited to the recent ones sent with a question */
export function historyFromExchanges(
  exchanges: Pick<AdvisoryExchange, 'question' | 'answer'>[],
  maxTurns = MAX_HISTORY_TURNS,
): ChatTurn[] {
  const turns = exchanges.flatMap((x): ChatTurn[] => x.answer
    ? [{ role: 'user', content: x.question }, { role: 'assistant', content: x.answer }]
    : [{ role: 'user', content: x.question }])
  return recentHistory(turns, maxTurns)
}

// ─── Suggestions ──────────────────────────────────────────────────────────

export const QUICK_QUESTIONS = [
  'How much should I keep in my emergency fund?',
  'Should I pay off debt or invest first?',
  'How much life insurance do I need?',
  'How can I reduce my monthly expenses?',
  'What is a good savings rate for me?',
  'How should I plan for retirement?',
  'Can I afford a vacation this year?',
  'How do I start investing with little money?',
]

export const MAX_SUGGESTIONS = 6

export function suggestQuestions(profile: FinancialProfile, features: DerivedFeatures): string[] {
  const out: string[] = []
  if (features.savingsRate < 0.1) out.push('How can I increase my savings rate?')
  if (features.debtToIncome > 0.5) out.push('What is the best strategy to pay off my debt?')
  if ((profile.investments ?? 0) < (profile.emergencyFund ?? 0) * 0.5) {
    out.push('Should I move some savings into investments?')
  }
  if (features.coverageRatio < 1 && profile.dependents > 0) {
    out.push('How much life insurance does my family need?')
  }
  if (profile.age < 30) out.push('What investment strategy suits someone in their 20s?')
  else if (profile.age >= 50) out.push('How should I prepare for retirement?')
  if (features.emergencyMonths < 3) out.push('How do I build an emergency fund quickly?')
  return out.slice(0, MAX_SUGGESTIONS)
}
