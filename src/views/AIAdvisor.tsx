/**
 * Ledgerwise - AI Advisor
 *
 * Chat over the saved profile. Answers come from Gemini when the server
 * has a key, otherwise from the built-in rules advisor.
 */

import { useState, useRef, useEffect, type ReactNode } from 'react'
import { Bot, Send, Loader2, Sparkles, User, Download, AlertTriangle } from 'lucide-react'
import { useLedger } from '../hooks/useLedger'
import { useNotify } from '../components/ToastSystem'
import { QUICK_QUESTIONS } from '../engine/ai-context'
import { MAX_QUESTION_LENGTH } from '../engine/advisory-service'
import { parseAdviceLine, tokenizeInline } from '../engine/advice-format'
import { datedFilename, downloadText } from '../engine/download'
import { notices } from '../engine/notices'
import type { AdvisoryExchange } from '../engine/types'

const PROVIDER_LABELS: Record<AdvisoryExchange['provider'], string> = {
  gemini: 'Gemini',
  offline: 'Built-in advisor',
  unavailable: 'Unavailable',
}

// ─── Rendering ──────────────────────────────────────────────────────

function renderInline(text: string): ReactNode {
  return tokenizeInline(text).map((token, i) => {
    switch (token.kind) {
      case 'bold':
        return <strong key={i} style={{ color: 'var(--text-primary)', fontWeight: 600 }}>{token.text}</strong>
      case 'code':
        return <code key={i} style={{ fontFamily: 'var(--font-mono)', fontSize: 12, background: 'var(--bg-hover)', padding: '1px 4px', borderRadius: 4 }}>{token.text}</code>
      case 'money':
        return <span key={i} style={{ fontFamily: 'var(--font-mono)', color: 'var(--accent-emerald)', fontWeight: 500 }}>{token.text}</span>
      default:
        return <span key={i}>{token.text}</span>
    }
  })
}

function renderContent(content: string): ReactNode {
  return content.split('\n').map((raw, i) => {
    const line = parseAdviceLine(raw)
    switch (line.kind) {
      case 'heading':
        return (
          <div key={i} style={{ fontSize: line.level === 2 ? 15 : 14, fontWeight: 600, color: 'var(--text-primary)', margin: '12px 0 6px' }}>
            {renderInline(line.text)}
          </div>
        )
      case 'bullet':
        return (
          <div key={i} style={{ display: 'flex', gap: 8, padding: '2px 0 2px 4px' }}>
            <span style={{ color: 'var(--accent-emerald)', flexShrink: 0 }}>•</span>
            <span>{renderInline(line.text)}</span>
          </div>
        )
      case 'numbered':
        return (
          <div key={i} style={{ display: 'flex', gap: 8, padding: '2px 0 2px 4px' }}>
            <span style={{ color: 'var(--accent-gold)', fontFamily: 'var(--font-mono)', fontSize: 12, flexShrink: 0, minWidth: 16 }}>{line.number}.</span>
            <span>{renderInline(line.text)}</span>
          </div>
        )
      case 'rule':
        return <hr key={i} style={{ border: 'none', borderTop: '1px solid var(--border-subtle)', margin: '12px 0' }} />
      case 'blank':
        return <div key={i} style={{ height: 8 }} />
      default:
        return <div key={i} style={{ padding: '1px 0' }}>{renderInline(line.text)}</div>
    }
  })
}

function Avatar({ kind }: { kind: 'user' | 'advisor' }) {
  return (
    <div style={{
      width: 32, height: 32, borderRadius: 10, flexShrink: 0,
      display: 'flex', alignItems: 'center', justifyContent: 'center',
      background: kind === 'advisor' ? 'linear-gradient(135deg, var(--accent-emerald), #059669)' : 'var(--bg-hover)',
    }}>
      {kind === 'advisor' ? <Bot size={16} color="#0c0e12" /> : <User size={16} color="var(--text-secondary)" />}
    </div>
  )
}

function ExchangeView({ exchange }: { exchange: AdvisoryExchange }) {
  return (
    <>
      <div style={{ display: 'flex', gap: 12, justifyContent: 'flex-end' }}>
        <div style={{ maxWidth: '75%', padding: '10px 14px', borderRadius: '14px 14px 4px 14px', background: 'var(--accent-gold-dim)', color: 'var(--text-primary)', fontSize: 13, lineHeight: 1.5 }}>
          {exchange.question}
        </div>
        <Avatar kind="user" />
      </div>
      <div style={{ display: 'flex', gap: 12 }}>
        <Avatar kind="advisor" />
        <div style={{ maxWidth: '80%' }}>
          <div style={{ padding: '12px 16px', borderRadius: '14px 14px 14px 4px', background: 'var(--bg-elevated)', border: '1px solid var(--border-subtle)', color: 'var(--text-secondary)', fontSize: 13, lineHeight: 1.6 }}>
            {exchange.answer
              ? renderContent(exchange.answer)
              : <span style={{ color: 'var(--text-muted)', fontStyle: 'italic' }}>Advice was unavailable for this question.</span>}
          </div>
          <div style={{ marginTop: 4, fontSize: 10, color: 'var(--text-muted)', fontFamily: 'var(--font-mono)' }}>
            {PROVIDER_LABELS[exchange.provider]} · {new Date(exchange.timestamp).toLocaleString('en-US')}
          </div>
        </div>
      </div>
    </>
  )
}

// ─── View ───────────────────────────────────────────────────────────

export function AIAdvisor() {
  const { exchanges, ask, asking, advisorNotice, exportTranscript, analysis, backend } = useLedger()
  const notify = useNotify()
  const [input, setInput] = useState('')
  const bottomRef = useRef<HTMLDivElement>(null)

  useEffect(() => {
    bottomRef.current?.scrollIntoView({ behavior: 'smooth' })
  }, [exchanges.length, asking])

  const suggestions = exchanges.length === 0 ? QUICK_QUESTIONS : (analysis?.suggestions ?? [])

  const send = (question: string) => {
    const q = question.trim()
    if (!q || asking) return
    setInput('')
    ask(q).catch(e => console.error('[Advisor] ask failed', e))
  }

  const downloadTranscript = async () => {
    const text = await exportTranscript()
    downloadText(datedFilename('ledgerwise-advisor', 'txt'), text)
  }

  const onDownload = () => {
    downloadTranscript().catch(e => {
      console.error('[Advisor] export failed', e)
      notify(notices.exportFailed('transcript', e))
    })
  }

  return (
    <div className="view-enter" style={{ display: 'flex', flexDirection: 'column', height: 'calc(100vh - 64px)' }}>
      <div style={{ display: 'flex', justifyContent: 'space-between', alignItems: 'flex-start', marginBottom: 16 }}>
        <div>
          <h1 className="section-title">AI Advisor</h1>
          <p className="section-subtitle">
            Ask about your finances. Answers use your saved profile{backend === 'local' ? ' and the built-in advisor' : ''}.
          </p>
        </div>
        <button className="btn btn-ghost" onClick={onDownload} disabled={exchanges.length === 0}>
          <Download size={14} /> Transcript
        </button>
      </div>

      {advisorNotice && (
        <div className="urgency-bar warning" role="status">
          <AlertTriangle size={14} />
          <span>{advisorNotice}</span>
        </div>
      )}

      {/* Conversation */}
      <div style={{ flex: 1, overflowY: 'auto', display: 'flex', flexDirection: 'column', gap: 16, paddingRight: 4 }}>
        {exchanges.length === 0 && !asking && (
          <div className="empty-state">
            <div className="empty-state-icon"><Sparkles size={28} /></div>
            <div className="empty-state-title">Start a conversation</div>
            <div className="empty-state-description">Pick a question below or ask your own.</div>
          </div>
        )}

        {exchanges.map(x => <ExchangeView key={x.id} exchange={x} />)}

        {asking && (
          <div style={{ display: 'flex', gap: 12, alignItems: 'center' }}>
            <Avatar kind="advisor" />
            <div style={{ display: 'flex', gap: 8, alignItems: 'center', fontSize: 13, color: 'var(--text-muted)' }}>
              <Loader2 size={14} className="spin" /> Thinking...
            </div>
          </div>
        )}
        <div ref={bottomRef} />
      </div>

      {/* Suggestions */}
      {suggestions.length > 0 && !asking && (
        <div style={{ display: 'flex', flexWrap: 'wrap', gap: 6, margin: '12px 0 8px' }}>
          {suggestions.map(q => (
            <button key={q} className="btn btn-ghost" style={{ fontSize: 11, padding: '4px 10px' }} onClick={() => send(q)}>
              {q}
            </button>
          ))}
        </div>
      )}

      {/* Input */}
      <form
        onSubmit={e => { e.preventDefault(); send(input) }}
        style={{ display: 'flex', gap: 8, padding: 8, background: 'var(--bg-elevated)', border: '1px solid var(--border-subtle)', borderRadius: 12 }}
      >
        <label htmlFor="advisor-question" className="sr-only">Your question</label>
        <input
          id="advisor-question"
          className="form-input"
          style={{ flex: 1, border: 'none', background: 'transparent' }}
          placeholder="Ask about saving, debt, insurance or investing..."
          value={input}
          maxLength={MAX_QUESTION_LENGTH}
          onChange={e => setInput(e.target.value)}
          disabled={asking}
        />
        <button type="submit" className="btn btn-primary" disabled={asking || !input.trim()} aria-label="Send question">
          {asking ? <Loader2 size={14} className="spin" /> : <Send size={14} />}
        </button>
      </form>
    </div>
  )
}
