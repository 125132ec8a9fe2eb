export interface CredentialPrompt {
  password(message: string): Promise<string>
  confirm(message: string): Promise<boolean>
}
