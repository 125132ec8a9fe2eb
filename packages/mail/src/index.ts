export {
  FetchHttpFetcher,
  type FetchHttpFetcherDeps,
  type FetchHttpFetcherOptions,
} from "./adapters/fetch/fetch-http-fetcher"
export { NodeHtmlParserDetector } from "./adapters/html/node-html-parser-detector"
export { InquirerCredentialPrompt } from "./adapters/inquirer/inquirer-credential-prompt"
export { mapSmtpError, type SmtpPhase } from "./adapters/nodemailer/map-smtp-error"
export {
  NodemailerSmtpConnector,
  type NodemailerSmtpConnectorDeps,
  type NodemailerSmtpConnectorOptions,
} from "./adapters/nodemailer/nodemailer-smtp-connector"
export { formatAddress, resolveAddresses } from "./core/addresses/resolve-addresses"
export { toAddressInput } from "./core/addresses/to-address-input"
export { isValidEmail } from "./core/addresses/validate-address"
export { classifyContent } from "./core/content/classify-content"
export { ContentCache } from "./core/content/content-cache"
export { contentIdFor } from "./core/content/content-id"
export { guessMimeType, parseContentType } from "./core/content/mime-lookup"
export { toContentSource } from "./core/content/to-content-source"
export {
  AuthError,
  ConnectError,
  ConnectionClosedError,
  InvalidAddressError,
  isMailError,
  MailError,
  type MailErrorCode,
  MailErrorCodes,
  PermanentRejectError,
  type SerializedMailError,
  serializeMailError,
  TransientDisconnectError,
} from "./core/errors/mail-error"
export { Mailer, type MailerDeps, type SendRequest } from "./core/mailer"
export {
  type BuildMessageRequest,
  type ComposerSession,
  type ContentItem,
  MessageComposer,
  type MessageComposerDeps,
  MIME_PREAMBLE,
} from "./core/message/message-composer"
export { serializeMessage } from "./core/message/serialize-message"
export { registerPassword } from "./core/session/register-password"
export { DEFAULT_MAIL_DOMAIN, resolvePassword } from "./core/session/resolve-password"
export {
  DEFAULT_BACKOFF_UNIT_MS,
  DEFAULT_SMTP_HOST,
  DEFAULT_SMTP_PORT,
  type LoginOptions,
  SEND_ATTEMPTS,
  SessionManager,
  type SessionManagerDeps,
  type UnsentMessage,
} from "./core/session/session-manager"
export { withSession } from "./core/session/with-session"
export type {
  AddressHeader,
  AddressHeaderField,
  AddressInput,
  AddressLike,
  AddressSet,
  EmailAddress,
  ResolveAddressesRequest,
} from "./ports/address"
export type { ContentLike, ContentObject, ContentSource } from "./ports/content"
export type { CredentialPrompt } from "./ports/credential-prompt"
export {
  type DeliveryResult,
  isDelivered,
  type MessagePreview,
  type QueuedResult,
  type SentResult,
  type SkippedResult,
} from "./ports/delivery"
export type { HtmlDetector } from "./ports/html-detector"
export type { HttpFetcher, HttpResponse } from "./ports/http-fetcher"
export type { ComposedMessage, MimePart } from "./ports/message"
export type {
  SmtpChannel,
  SmtpConnector,
  SmtpCredentials,
  SmtpEndpoint,
  SmtpEnvelope,
  SmtpTransmitResult,
  StartTlsMode,
} from "./ports/smtp"
