import path from 'node:path'

import { detectType } from '../parsing/detectType.ts'

export type UploadRejection = 'too_large' | 'type_not_allowed'

export class UploadRejectedError extends Error {
  readonly reason: UploadRejection

  constructor(reason: UploadRejection, message: string) {
    super(message)
    this.name = 'UploadRejectedError'
    this.reason = reason
  }
}

export function sanitizeFilename(name: string): string {
  const base = path.basename(String(name || 'upload'))
  return (
    base
      .replace(/[\u0000-\u001f\u007f]/g, '')
      .replace(/[\\/]/g, '_')
      .slice(0, 255) || 'upload'
  )
}

export function validateUploadOrThrow({
  originalName,
  mimeType,
  sizeBytes,
  maxBytes,
  allowedExtensions,
}: {
  originalName: string
  mimeType?: string
  sizeBytes: number
  maxBytes: number
  allowedExtensions: readonly string[]
}): { extension: string; mimeType: string } {
  if (sizeBytes > maxBytes) {
    throw new UploadRejectedError('too_large', `File too large (max ${maxBytes} bytes)`)
  }

  const detected = detectType(typeof mimeType === 'string' ? { originalName, mimeType } : { originalName })
  if (!allowedExtensions.includes(detected.extension)) {
    throw new UploadRejectedError('type_not_allowed', `File type not allowed: .${detected.extension}`)
  }
  return detected
}
