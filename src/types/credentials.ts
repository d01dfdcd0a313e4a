export type TokenSource = 'workos' | 'cognito'

export interface Credential {
  readonly accessToken: string
  readonly refreshToken?: string
  readonly expiresAt?: Date
  readonly source: TokenSource
  readonly path: string
}
