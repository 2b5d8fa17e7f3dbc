export class StorageError extends Error {
  readonly code = 'STORAGE_ERROR'

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'StorageError'
  }
}
