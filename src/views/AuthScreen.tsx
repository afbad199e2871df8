/**
 * Ledgerwise - Auth Screen
 *
 * Login and registration, with a local-only mode that keeps everything
 * in this browser.
 */

import { useState, useEffect, useRef, type CSSProperties, type FormEvent } from 'react'
import { Wallet } from 'lucide-react'
import { useAuth, type AuthMode } from '../context/AuthContext'

const MIN_PASSWORD_LENGTH = 8

const styles = {
  container: {
    minHeight: '100vh',
    display: 'flex',
    alignItems: 'center',
    justifyContent: 'center',
    background: 'linear-gradient(135deg, #0a0e1a 0%, #111827 50%, #0f172a 100%)',
    fontFamily: "'Inter', -apple-system, BlinkMacSystemFont, sans-serif",
    padding: '1rem',
  },
  card: {
    width: '100%',
    maxWidth: '420px',
    background: 'rgba(17, 24, 39, 0.8)',
    border: '1px solid rgba(52, 211, 153, 0.15)',
    borderRadius: '16px',
    padding: '2.5rem 2rem',
    backdropFilter: 'blur(20px)',
    boxShadow: '0 25px 50px rgba(0, 0, 0, 0.5)',
  },
  logo: {
    textAlign: 'center',
    marginBottom: '2rem',
  },
  logoText: {
    fontSize: '1.5rem',
    fontWeight: 700,
    color: '#34d399',
    letterSpacing: '-0.02em',
    marginTop: '0.5rem',
  },
  logoSub: {
    fontSize: '0.8rem',
    color: '#9ca3af',
    marginTop: '0.25rem',
  },
  label: {
    display: 'block',
    fontSize: '0.8rem',
    fontWeight: 500,
    color: '#d1d5db',
    marginBottom: '0.4rem',
  },
  input: {
    width: '100%',
    padding: '0.7rem 0.9rem',
    background: 'rgba(31, 41, 55, 0.8)',
    border: '1px solid rgba(75, 85, 99, 0.5)',
    borderRadius: '8px',
    color: '#f3f4f6',
    fontSize: '0.9rem',
    outline: 'none',
    boxSizing: 'border-box',
  },
  fieldGroup: {
    marginBottom: '1rem',
  },
  button: {
    width: '100%',
    padding: '0.75rem',
    background: 'linear-gradient(135deg, #34d399, #059669)',
    border: 'none',
    borderRadius: '8px',
    color: '#0a0e1a',
    fontSize: '0.95rem',
    fontWeight: 600,
    cursor: 'pointer',
    marginTop: '0.5rem',
  },
  buttonDisabled: {
    opacity: 0.6,
    cursor: 'not-allowed',
  },
  secondaryButton: {
    width: '100%',
    padding: '0.6rem',
    background: 'transparent',
    border: '1px solid rgba(75, 85, 99, 0.5)',
    borderRadius: '8px',
    color: '#9ca3af',
    fontSize: '0.85rem',
    cursor: 'pointer',
    marginTop: '0.75rem',
  },
  toggleRow: {
    textAlign: 'center',
    marginTop: '1.5rem',
    fontSize: '0.85rem',
    color: '#9ca3af',
  },
  toggleLink: {
    color: '#34d399',
    cursor: 'pointer',
    fontWeight: 500,
    background: 'none',
    border: 'none',
    fontSize: '0.85rem',
    textDecoration: 'underline',
  },
  error: {
    background: 'rgba(239, 68, 68, 0.1)',
    border: '1px solid rgba(239, 68, 68, 0.3)',
    borderRadius: '8px',
    padding: '0.6rem 0.8rem',
    marginBottom: '1rem',
    fontSize: '0.8rem',
    color: '#fca5a5',
  },
  divider: {
    display: 'flex',
    alignItems: 'center',
    gap: '0.75rem',
    margin: '1.5rem 0',
    fontSize: '0.75rem',
    color: '#6b7280',
  },
  dividerLine: {
    flex: 1,
    height: '1px',
    background: 'rgba(75, 85, 99, 0.4)',
  },
} satisfies Record<string, CSSProperties>

export function AuthScreen() {
  const { login, register, authError, enableOfflineMode } = useAuth()

  const [mode, setMode] = useState<AuthMode>('login')
  const [email, setEmail] = useState('')
  const [password, setPassword] = useState('')
  const [confirmPassword, setConfirmPassword] = useState('')
  const [displayName, setDisplayName] = useState('')
  const [isSubmitting, setIsSubmitting] = useState(false)
  const [localError, setLocalError] = useState<string | null>(null)

  const emailRef = useRef<HTMLInputElement>(null)
  useEffect(() => { emailRef.current?.focus() }, [mode])

  // ---- Auth Submit ----

  const submit = async () => {
    setLocalError(null)

    if (!email.trim() || !password.trim()) {
      setLocalError('Please fill in all fields')
      return
    }

    if (mode === 'register') {
      if (password.length < MIN_PASSWORD_LENGTH) {
        setLocalError(`Password must be at least ${MIN_PASSWORD_LENGTH} characters`)
        return
      }
      if (password !== confirmPassword) {
        setLocalError('Passwords do not match')
        return
      }
    }

    setIsSubmitting(true)
    try {
      // Failures surface through authError
      if (mode === 'login') await login(email, password)
      else await register(email, password, displayName || undefined)
    } finally {
      setIsSubmitting(false)
    }
  }

  const handleSubmit = (e: FormEvent) => {
    e.preventDefault()
    submit().catch(err => {
      console.error('[Auth] submit failed', err)
      setLocalError('Something went wrong. Please try again.')
    })
  }

  const switchMode = (next: AuthMode) => {
    setMode(next)
    setLocalError(null)
  }

  const error = localError || authError

  return (
    <div style={styles.container}>
      <div style={styles.card}>
        <div style={styles.logo}>
          <Wallet size={36} color="#34d399" />
          <div style={styles.logoText}>Ledgerwise</div>
          <div style={styles.logoSub}>
            {mode === 'login' ? 'Welcome Back' : 'Create Your Account'}
          </div>
        </div>

        {error && <div style={styles.error} role="alert">{error}</div>}

        <form onSubmit={handleSubmit}>
          {mode === 'register' && (
            <div style={styles.fieldGroup}>
              <label style={styles.label} htmlFor="auth-name">Display Name (optional)</label>
              <input
                id="auth-name"
                type="text"
                placeholder="How should we address you?"
                value={displayName}
                onChange={e => setDisplayName(e.target.value)}
                style={styles.input}
                autoComplete="name"
              />
            </div>
          )}

          <div style={styles.fieldGroup}>
            <label style={styles.label} htmlFor="auth-email">Email</label>
            <input
              id="auth-email"
              ref={emailRef}
              type="email"
              placeholder="you@example.com"
              value={email}
              onChange={e => setEmail(e.target.value)}
              style={styles.input}
              autoComplete="email"
              required
            />
          </div>

          <div style={styles.fieldGroup}>
            <label style={styles.label} htmlFor="auth-password">Password</label>
            <input
              id="auth-password"
              type="password"
              placeholder={mode === 'register' ? `At least ${MIN_PASSWORD_LENGTH} characters` : '••••••••'}
              value={password}
              onChange={e => setPassword(e.target.value)}
              style={styles.input}
              autoComplete={mode === 'login' ? 'current-password' : 'new-password'}
              required
            />
          </div>

          {mode === 'register' && (
            <div style={styles.fieldGroup}>
              <label style={styles.label} htmlFor="auth-confirm">Confirm Password</label>
              <input
                id="auth-confirm"
                type="password"
                placeholder="Confirm your password"
                value={confirmPassword}
                onChange={e => setConfirmPassword(e.target.value)}
                style={styles.input}
                autoComplete="new-password"
                required
              />
            </div>
          )}

          <button
            type="submit"
            disabled={isSubmitting}
            style={{ ...styles.button, ...(isSubmitting ? styles.buttonDisabled : {}) }}
          >
            {isSubmitting
              ? (mode === 'login' ? 'Signing In...' : 'Creating Account...')
              : (mode === 'login' ? 'Sign In' : 'Create Account')
            }
          </button>
        </form>

        <div style={styles.toggleRow}>
          {mode === 'login' ? (
            <>
              Don't have an account?{' '}
              <button style={styles.toggleLink} onClick={() => switchMode('register')}>Sign up</button>
            </>
          ) : (
            <>
              Already have an account?{' '}
              <button style={styles.toggleLink} onClick={() => switchMode('login')}>Sign in</button>
            </>
          )}
        </div>

        <div style={styles.divider}>
          <div style={styles.dividerLine} />
          <span>or</span>
          <div style={styles.dividerLine} />
        </div>

        <button onClick={enableOfflineMode} style={styles.secondaryButton}>
          Continue Without Account
        </button>
        <p style={{ color: '#6b7280', fontSize: '0.7rem', textAlign: 'center', marginTop: '1rem' }}>
          Local mode keeps your profile in this browser and answers questions with the built-in advisor.
        </p>
      </div>
    </div>
  )
}
