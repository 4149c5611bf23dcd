import path from 'node:path'

const MIME_BY_EXT: Record<string, string> = {
  pdf: 'application/pdf',
  txt: 'text/plain',
  md: 'text/markdown',
  csv: 'text/csv',
  json: 'application/json',
  xlsx: 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
  docx: 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
  pptx: 'application/vnd.openxmlformats-officedocument.presentationml.presentation',
}

/**
 * Extension first: browser-provided mimetypes are not reliable, and
 * `application/octet-stream` tells us nothing.
 */
export function detectType({
  originalName,
  mimeType,
}: {
  originalName: string
  mimeType?: string
}): { extension: string; mimeType: string } {
  const safeName = path.basename(String(originalName || 'upload'))
  const lower = safeName.toLowerCase()
  const ext = lower === 'dockerfile' ? 'dockerfile' : path.extname(lower).replace('.', '') || 'bin'

  const declared = String(mimeType || '').toLowerCase().split(';')[0]?.trim() ?? ''
  const useful = declared && declared !== 'application/octet-stream' ? declared : ''

  return {
    extension: ext,
    mimeType: MIME_BY_EXT[ext] ?? (useful || 'application/octet-stream'),
  }
}
