import { confirm, password } from "@inquirer/prompts"
import type { CredentialPrompt } from "../../ports/credential-prompt"

/**
 * Terminal prompt; the password is masked while typed.
 */
export class InquirerCredentialPrompt implements CredentialPrompt {
  async password(message: string): Promise<string> {
    return password({ message, mask: "*" })
  }

  async confirm(message: string): Promise<boolean> {
    return confirm({ message, default: false })
  }
}
