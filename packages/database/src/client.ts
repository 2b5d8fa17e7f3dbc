// Supabase client configuration for the layoffs cleaning job
// The job runs server-side only, so sessions are never persisted

import { createClient, type SupabaseClient } from '@supabase/supabase-js'
import { APP_NAME, APP_VERSION } from '@layoffs/shared'
import { StorageError } from './errors'

export type { SupabaseClient }

export interface LayoffsClientConfig {
  url?: string
  key?: string
}

export const createLayoffsClient = (config: LayoffsClientConfig): SupabaseClient => {
  if (!config.url) {
    throw new StorageError('Missing Supabase URL: set LAYOFFS_SUPABASE_URL')
  }

  if (!config.key) {
    throw new StorageError('Missing Supabase key: set LAYOFFS_SUPABASE_KEY')
  }

  return createClient(config.url, config.key, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
    },
    db: {
      schema: 'public',
    },
    global: {
      headers: {
        'X-Client-Info': `${APP_NAME}/${APP_VERSION}`
      }
    }
  })
}

