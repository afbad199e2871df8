/**
 * Ledgerwise - Advice formatting
 *
 * The advisor answers in a small markdown subset: headings, bullet and
 * numbered lists, rules, **bold** and `code`. Dollar amounts are picked
 * out so the chat can highlight them.
 */

export type AdviceLine =
  | { kind: 'heading'; level: 2 | 3; text: string }
  | { kind: 'bullet'; text: string }
  | { kind: 'numbered'; number: string; text: string }
  | { kind: 'rule' }
  | { kind: 'blank' }
  | { kind: 'paragraph'; text: string }

export interface InlineToken {
  kind: 'text' | 'bold' | 'code' | 'money'
  text: string
}

export function parseAdviceLine(line: string): AdviceLine {
  if (line.startsWith('### ')) return { kind: 'heading', level: 3, text: line.slice(4) }
  if (line.startsWith('## ')) return { kind: 'heading', level: 2, text: line.slice(3) }
  if (/^[-•*]\s/.test(line)) return { kind: 'bullet', text: line.replace(/^[-•*]\s*/, '') }

  const numbered = /^(\d+)\.\s+(.*)$/.exec(line)
  if (numbered) return { kind: 'numbered', number: numbered[1] ?? '', text: numbered[2] ?? '' }

  const trimmed = line.trim()
  if (trimmed === '---') return { kind: 'rule' }
  if (trimmed === '') return { kind: 'blank' }
  return { kind: 'paragraph', text: line }
}

const INLINE_PATTERN = /\*\*(.+?)\*\*|`(.+?)`|\$[\d,]+(?:\.\d{2})?(?:\/\w+)?/g

export function tokenizeInline(text: string): InlineToken[] {
  const tokens: InlineToken[] = []
  let last = 0
  for (const match of text.matchAll(INLINE_PATTERN)) {
    const index = match.index ?? 0
    if (index > last) tokens.push({ kind: 'text', text: text.slice(last, index) })
    if (match[1] !== undefined) tokens.push({ kind: 'bold', text: match[1] })
    else if (match[2] !== undefined) tokens.push({ kind: 'code', text: match[2] })
    else tokens.push({ kind: 'money', text: match[0] })
    last = index + match[0].length
  }
  if (last < text.length) tokens.push({ kind: 'text', text: text.slice(last) })
  return tokens
}
