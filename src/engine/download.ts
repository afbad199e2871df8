/**
 * Ledgerwise - Browser downloads for CSV profiles and advisor transcripts
 */

/** `ledgerwise-profile-2026-03-04.csv` */
export function datedFilename(prefix: string, extension: string, now: Date = new Date()): string {
  return `${prefix}-${now.toISOString().slice(0, 10)}.${extension}`
}

export function downloadText(filename: string, text: string, type = 'text/plain'): void {
  const blob = new Blob([text], { type: `${type};charset=utf-8` })
  const url = URL.createObjectURL(blob)
  const a = document.createElement('a')
  a.href = url
  a.download = filename
  a.click()
  URL.revokeObjectURL(url)
}
