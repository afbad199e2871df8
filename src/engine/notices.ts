/**
 * Ledgerwise - Notices
 * Wording and lifetime of the short notices shown after saves, imports and exports.
 */

import type { FieldIssue } from './validation'

export type NoticeTone = 'success' | 'warning' | 'error' | 'info'

export interface Notice {
  tone: NoticeTone
  title: string
  detail?: string
  /** Milliseconds on screen; 0 keeps it until dismissed */
  duration: number
}

const BRIEF = 4000
const READABLE = 8000
export const MAX_VISIBLE_NOTICES = 4

const messageOf = (e: unknown) => (e instanceof Error ? e.message : undefined)

const listIssues = (issues: FieldIssue[]) => issues.map(i => `${i.path}: ${i.message}`).join('; ')

export const notices = {
  profileSaved: (warnings: FieldIssue[]): Notice => warnings.length
    ? { tone: 'warning', title: 'Profile saved with warnings', detail: warnings.map(w => w.message).join('; '), duration: READABLE }
    : { tone: 'success', title: 'Profile saved', detail: 'Your scores have been updated.', duration: BRIEF },

  profileNotSaved: (reason: unknown): Notice => ({
    tone: 'error',
    title: 'Profile not saved',
    detail: typeof reason === 'string' ? reason : messageOf(reason),
    duration: READABLE,
  }),

  fixFieldsFirst: (issues: FieldIssue[], action: 'save' | 'export'): Notice => ({
    tone: 'error',
    title: action === 'save' ? 'Please fix the highlighted fields' : 'Fix the highlighted fields before exporting',
    detail: issues[0]?.message,
    duration: BRIEF,
  }),

  profileImported: (fileName: string): Notice => ({
    tone: 'info',
    title: `${fileName} imported`,
    detail: 'Review the values and save to update your scores.',
    duration: BRIEF,
  }),

  importRejected: (fileName: string, issues: FieldIssue[]): Notice => ({
    tone: 'error',
    title: `${fileName} could not be imported`,
    detail: listIssues(issues),
    duration: 0,
  }),

  fileUnreadable: (fileName: string, e: unknown): Notice => ({
    tone: 'error',
    title: `Could not read ${fileName}`,
    detail: messageOf(e),
    duration: READABLE,
  }),

  exportFailed: (what: 'transcript' | 'profile', e: unknown): Notice => ({
    tone: 'error',
    title: what === 'transcript' ? 'Transcript export failed' : 'Profile export failed',
    detail: messageOf(e),
    duration: READABLE,
  }),
}

/**
 * Adds `next` to the visible notices. A notice with the same title is
 * replaced rather than stacked, and only the newest `max` are kept.
 */
export function queueNotice<T extends Notice>(visible: T[], next: T, max = MAX_VISIBLE_NOTICES): T[] {
  return [...visible.filter(n => n.title !== next.title), next].slice(-max)
}
