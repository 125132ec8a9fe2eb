import yargs from "yargs"

export type CliArgs = {
  to?: string[]
  subject?: string[]
  contents?: string[]
  user?: string
  password?: string
}

export class UsageError extends Error {
  override readonly name = "UsageError"
}

/**
 * Parse argparse-style flags: single-dash long names (`-to`, `-subject`)
 * with their one-letter aliases, list flags taking every value up to the
 * next flag.
 */
export function parseArgs(argv: readonly string[]): CliArgs {
  const parsed = yargs([...argv])
    .scriptName("postline")
    .usage("$0 -to <address...> -subject <words...> -contents <item...>")
    .parserConfiguration({ "short-option-groups": false })
    .option("to", {
      alias: "t",
      type: "string",
      array: true,
      describe: "Send to these addresses",
    })
    .option("subject", {
      alias: "s",
      type: "string",
      array: true,
      describe: "Subject words, joined with spaces",
    })
    .option("contents", {
      alias: "c",
      type: "string",
      array: true,
      describe: "Text, HTML, file paths or URLs to include",
    })
    .option("user", {
      alias: "u",
      type: "string",
      describe: "Mailbox to send from",
    })
    .option("password", {
      alias: "p",
      type: "string",
      describe: "Prefer the secret store over passing a password here",
    })
    .strict()
    .help(false)
    .version(false)
    .exitProcess(false)
    .fail((message, err) => {
      throw new UsageError(err?.message ?? message)
    })
    .parseSync()

  return {
    ...(parsed.to && { to: parsed.to }),
    ...(parsed.subject && { subject: parsed.subject }),
    ...(parsed.contents && { contents: parsed.contents }),
    ...(parsed.user !== undefined && { user: parsed.user }),
    ...(parsed.password !== undefined && { password: parsed.password }),
  }
}
