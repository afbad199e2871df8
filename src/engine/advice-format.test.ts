import { describe, it, expect } from 'vitest'
import { parseAdviceLine, tokenizeInline } from './advice-format'

describe('parseAdviceLine', () => {
  it('recognises headings, lists and rules', () => {
    expect(parseAdviceLine('## Next steps')).toEqual({ kind: 'heading', level: 2, text: 'Next steps' })
    expect(parseAdviceLine('### Debt')).toEqual({ kind: 'heading', level: 3, text: 'Debt' })
    expect(parseAdviceLine('- Pay the card first')).toEqual({ kind: 'bullet', text: 'Pay the card first' })
    expect(parseAdviceLine('* Automate savings')).toEqual({ kind: 'bullet', text: 'Automate savings' })
    expect(parseAdviceLine('2. Build the fund')).toEqual({ kind: 'numbered', number: '2', text: 'Build the fund' })
    expect(parseAdviceLine(' --- ')).toEqual({ kind: 'rule' })
    expect(parseAdviceLine('   ')).toEqual({ kind: 'blank' })
  })

  it('leaves emphasis at the start of a line as a paragraph', () => {
    expect(parseAdviceLine('**Summary:** you are on track')).toEqual({ kind: 'paragraph', text: '**Summary:** you are on track' })
  })
})

describe('tokenizeInline', () => {
  it('splits bold, code and dollar amounts out of the text', () => {
    expect(tokenizeInline('Save **$500** a month into `HYSA` to reach $6,000.00/year')).toEqual([
      { kind: 'text', text: 'Save ' },
      { kind: 'bold', text: '$500' },
      { kind: 'text', text: ' a month into ' },
      { kind: 'code', text: 'HYSA' },
      { kind: 'text', text: ' to reach ' },
      { kind: 'money', text: '$6,000.00/year' },
    ])
  })

  it('returns plain text as a single token', () => {
    expect(tokenizeInline('No amounts here')).toEqual([{ kind: 'text', text: 'No amounts here' }])
    expect(tokenizeInline('')).toEqual([])
  })
})
