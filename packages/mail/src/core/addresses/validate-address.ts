import { z } from "zod"

const emailSchema = z.email()

export function isValidEmail(address: string): boolean {
  return emailSchema.safeParse(address).success
}
