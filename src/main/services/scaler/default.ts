/**
 * Process-wide scaler, configured once from the SCALE_POOL_* environment
 * (a .env file in the working directory included).
 *
 * A bad configuration fails the first call and is logged then; the
 * environment is not read again and every later call rethrows the same
 * ConfigurationError.
 */

import { config as loadDotenv } from 'dotenv'
import { getErrorMessage } from '../../../shared/errors'
import { AsyncScaler, createAsyncScaler } from './async-scaler'

let defaultScaler: AsyncScaler | undefined
let initError: unknown

export function getAsyncScaler(): AsyncScaler {
  if (defaultScaler) return defaultScaler
  if (initError !== undefined) throw initError

  try {
    // .env values never override variables already set
    loadDotenv()
    defaultScaler = createAsyncScaler()
  } catch (error) {
    initError = error
    console.error(`[AsyncScaler] Initialization failed: ${getErrorMessage(error)}`)
    throw error
  }
  return defaultScaler
}
