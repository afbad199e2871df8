/**
 * Ledgerwise - Auth Context
 *
 * Wraps the app with authentication state. Handles login, register and
 * logout, and a local-only mode for using the dashboard without an account.
 */

import { createContext, useContext, useState, useEffect, useCallback, type ReactNode } from 'react'
import {
  AuthAPI,
  APIError,
  type AuthUser,
  getStoredUser,
  isAuthenticated,
  hasRefreshToken,
  clearAuthData,
} from '../engine/api-client'

// ============================================
//  TYPES
// ============================================

export type AuthMode = 'login' | 'register'

interface AuthContextType {
  user: AuthUser | null
  isLoggedIn: boolean
  isLoading: boolean
  authError: string | null

  login: (email: string, password: string) => Promise<boolean>
  register: (email: string, password: string, displayName?: string) => Promise<boolean>
  logout: () => Promise<void>

  // Mode (allows using app without account)
  isOfflineMode: boolean
  enableOfflineMode: () => void
  connectAccount: () => void
}

const AuthContext = createContext<AuthContextType | null>(null)

const OFFLINE_FLAG = 'ledgerwise:offline-mode'

function describeAuthError(e: unknown, fallback: string): string {
  if (e instanceof APIError) {
    if (e.status === 0) return 'Could not reach the server. You can continue without an account.'
    return e.message
  }
  return fallback
}

// ============================================
//  PROVIDER
// ============================================

export function AuthProvider({ children }: { children: ReactNode }) {
  const [user, setUser] = useState<AuthUser | null>(null)
  const [isLoading, setIsLoading] = useState(true)
  const [authError, setAuthError] = useState<string | null>(null)
  const [isOfflineMode, setIsOfflineMode] = useState(false)

  // ---- Initialize auth state ----
  useEffect(() => {
    let cancelled = false

    async function init() {
      const storedUser = getStoredUser()
      if (storedUser && (isAuthenticated() || hasRefreshToken())) {
        setUser(storedUser)
        try {
          const { user: current } = await AuthAPI.me()
          if (!cancelled) setUser(current)
        } catch (e) {
          // A rejected session signs out; a network failure keeps the cached user
          if (e instanceof APIError && e.status === 401) {
            clearAuthData()
            if (!cancelled) setUser(null)
          } else {
            console.warn('[Auth] Session check failed, continuing with cached user', e)
          }
        }
      } else if (localStorage.getItem(OFFLINE_FLAG) === 'true') {
        setIsOfflineMode(true)
      }
      if (!cancelled) setIsLoading(false)
    }

    init().catch(e => {
      console.error('[Auth] init failed', e)
      setIsLoading(false)
    })
    return () => { cancelled = true }
  }, [])

  // ---- Auth Actions ----

  const login = useCallback(async (email: string, password: string): Promise<boolean> => {
    setAuthError(null)
    try {
      const result = await AuthAPI.login(email, password)
      setUser(result.user)
      setIsOfflineMode(false)
      localStorage.removeItem(OFFLINE_FLAG)
      return true
    } catch (e) {
      setAuthError(describeAuthError(e, 'Login failed'))
      return false
    }
  }, [])

  const register = useCallback(async (email: string, password: string, displayName?: string): Promise<boolean> => {
    setAuthError(null)
    try {
      const result = await AuthAPI.register(email, password, displayName)
      setUser(result.user)
      setIsOfflineMode(false)
      localStorage.removeItem(OFFLINE_FLAG)
      return true
    } catch (e) {
      setAuthError(describeAuthError(e, 'Registration failed'))
      return false
    }
  }, [])

  const logout = useCallback(async () => {
    await AuthAPI.logout()
    setUser(null)
    setIsOfflineMode(false)
    localStorage.removeItem(OFFLINE_FLAG)
  }, [])

  // ---- Offline Mode ----

  const enableOfflineMode = useCallback(() => {
    setIsOfflineMode(true)
    setAuthError(null)
    localStorage.setItem(OFFLINE_FLAG, 'true')
  }, [])

  // Exit offline mode → return to auth screen (no network calls)
  const connectAccount = useCallback(() => {
    setIsOfflineMode(false)
    setUser(null)
    localStorage.removeItem(OFFLINE_FLAG)
  }, [])

  return (
    <AuthContext.Provider value={{
      user,
      isLoggedIn: !!user,
      isLoading,
      authError,
      login,
      register,
      logout,
      isOfflineMode,
      enableOfflineMode,
      connectAccount,
    }}>
      {children}
    </AuthContext.Provider>
  )
}

export function useAuth() {
  const ctx = useContext(AuthContext)
  if (!ctx) throw new Error('useAuth must be used within AuthProvider')
  return ctx
}
