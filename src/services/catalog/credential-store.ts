/**
 * Account the client talks to the catalog as.
 *
 * `credentialsNeeded` is raised when the service rejects the current
 * credentials and cleared when new ones are supplied.
 */
export class CredentialStore {
  private needed = false

  constructor(
    private username = '',
    private password = '',
  ) {}

  get currentUsername(): string {
    return this.username
  }

  get hasUsername(): boolean {
    return this.username.trim().length > 0
  }

  get credentialsNeeded(): boolean {
    return this.needed || !this.hasUsername
  }

  set(username: string, password: string): void {
    this.username = username
    this.password = password
    this.needed = false
  }

  markRejected(): void {
    this.needed = true
  }

  /**
   * HTTP Basic header for the stored account, undefined without a password
   */
  authorizationHeader(): string | undefined {
    if (!this.hasUsername || !this.password) return undefined
    const token = Buffer.from(`${this.username}:${this.password}`).toString(
      'base64',
    )
    return `Basic ${token}`
  }
}
