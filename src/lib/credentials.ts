/**
 * Granolaデスクトップアプリが保存するトークンファイル(supabase.json)の読み込み
 * ネットワークアクセスもファイルの書き換えも行わない
 */
import { readFile } from 'node:fs/promises'
import { homedir } from 'node:os'
import { join } from 'node:path'
import type { Logger } from 'pino'
import type { Credential, TokenSource } from '../types/credentials.js'
import { AuthError, errorMessage } from './errors.js'
import { logger as defaultLogger } from './logger.js'
import { credentialFileSchema, describeIssues, tokenDataSchema } from './schemas.js'

const CREDENTIALS_FILE = 'supabase.json'

/** OSごとのElectron appDataディレクトリ配下のトークンファイル */
export function defaultCredentialsPath(
  platform: NodeJS.Platform = process.platform,
  env: NodeJS.ProcessEnv = process.env,
  home: string = homedir()
): string {
  if (platform === 'darwin') {
    return join(home, 'Library', 'Application Support', 'Granola', CREDENTIALS_FILE)
  }
  if (platform === 'win32') {
    return join(env.APPDATA || join(home, 'AppData', 'Roaming'), 'Granola', CREDENTIALS_FILE)
  }
  return join(env.XDG_CONFIG_HOME || join(home, '.config'), 'Granola', CREDENTIALS_FILE)
}

// fsのエラーはJestのサンドボックスではinstanceof Errorにならないので形で判定する
function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT'
}

function parseTokenContainer(container: string | Record<string, unknown>, path: string): unknown {
  if (typeof container !== 'string') {
    return container
  }
  try {
    return JSON.parse(container)
  } catch (error) {
    throw new AuthError(`Token data in ${path} is not valid JSON`, { cause: error })
  }
}

// expires_at は秒/ミリ秒どちらもあり得る
function resolveExpiry(tokens: {
  expires_at?: number | null
  expires_in?: number | null
  obtained_at?: number | null
}): Date | undefined {
  if (typeof tokens.expires_at === 'number') {
    const ms = tokens.expires_at < 1e12 ? tokens.expires_at * 1000 : tokens.expires_at
    return new Date(ms)
  }
  if (typeof tokens.obtained_at === 'number' && typeof tokens.expires_in === 'number') {
    return new Date(tokens.obtained_at + tokens.expires_in * 1000)
  }
  return undefined
}

export async function loadCredentials(
  path: string = defaultCredentialsPath(),
  log: Logger = defaultLogger,
  now: Date = new Date()
): Promise<Credential> {
  let raw: string
  try {
    raw = await readFile(path, 'utf-8')
  } catch (error) {
    if (isMissingFile(error)) {
      throw new AuthError(`Credentials file not found at: ${path}`, { cause: error })
    }
    throw new AuthError(`Error reading credentials file ${path}: ${errorMessage(error)}`, { cause: error })
  }

  let data: unknown
  try {
    data = JSON.parse(raw)
  } catch (error) {
    throw new AuthError(`Credentials file is not valid JSON: ${path}`, { cause: error })
  }

  const file = credentialFileSchema.safeParse(data)
  if (!file.success) {
    throw new AuthError(`Unexpected credentials file format (${describeIssues(file.error)}): ${path}`)
  }

  // 新しいアプリはworkos_tokens、古いものはcognito_tokens
  let source: TokenSource
  let container: string | Record<string, unknown>
  if (file.data.workos_tokens) {
    source = 'workos'
    container = file.data.workos_tokens
  } else if (file.data.cognito_tokens) {
    source = 'cognito'
    container = file.data.cognito_tokens
  } else {
    throw new AuthError(`No workos_tokens or cognito_tokens found in ${path}`)
  }

  const tokens = tokenDataSchema.safeParse(parseTokenContainer(container, path))
  if (!tokens.success) {
    throw new AuthError(`Unexpected token format (${describeIssues(tokens.error)}): ${path}`)
  }

  const accessToken = tokens.data.access_token?.trim()
  if (!accessToken) {
    throw new AuthError('No access token found in credentials file')
  }

  const expiresAt = resolveExpiry(tokens.data)
  if (expiresAt && expiresAt.getTime() <= now.getTime()) {
    log.warn(
      { expiresAt: expiresAt.toISOString() },
      'Access token looks expired; open the Granola app to refresh it'
    )
  }

  log.debug({ source, path }, 'Successfully loaded credentials')
  return {
    accessToken,
    ...(tokens.data.refresh_token ? { refreshToken: tokens.data.refresh_token } : {}),
    ...(expiresAt ? { expiresAt } : {}),
    source,
    path,
  }
}
