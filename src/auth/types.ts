export interface User {
  id: number
  username: string
}

/**
 * What the auth service needs from a session: read the bound identity,
 * bind a new one and drop it. The HTTP layer adapts express-session to this.
 */
export interface AuthSession {
  userId: () => number | undefined
  bind: (userId: number) => Promise<void>
  clear: () => Promise<void>
}
