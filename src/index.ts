/**
 * wirekit
 *
 * One request/response model for HTTP, FTP, SMTP, Telnet and
 * Tor-tunnelled HTTP.
 *
 * @example
 * ```typescript
 * import { withSession } from 'wirekit';
 *
 * await withSession({ timeout: 10_000 }, async (session) => {
 *   const page = await session.http.get('https://example.com');
 *   const files = await session.ftp.listRecursive('ftp://ftp.example.com/pub');
 *   const sent = await session.smtp.sendEmail('smtps://mail.example.com', {
 *     from: 'me@example.com',
 *     password: 'test-secret',
 *     to: 'you@example.com',
 *     subject: 'Report',
 *     message: 'See attachment',
 *     attachments: ['./report.pdf'],
 *   }, false);
 * });
 * ```
 */

// ============================================================================
// Session
// ============================================================================

export { Session, openSession, withSession } from './core/session.js';
export { loadConfig, sessionConfigSchema, type SessionConfig, type SessionOptions } from './core/config.js';
export type { SessionContext } from './core/context.js';

// ============================================================================
// Responses and sinks
// ============================================================================

export {
  HttpResponseBuilder,
  FtpResponseBuilder,
  TelnetResponseBuilder,
  MailPayloadSink,
  MemoryBody,
  FileBody,
  FileSource,
  emptyHttpResponse,
  emptyFtpResponse,
  type HttpResponse,
  type FtpResponse,
  type TelnetResponse,
  type BodyTarget,
  type ReadSource,
} from './core/response.js';
export { BaseSink, failedResult, type TransferSink, type TransferEngine, type TransferResult } from './core/transfer.js';

// ============================================================================
// Protocol clients
// ============================================================================

export {
  HttpClient,
  basicAuthorization,
  type HttpRequestOptions,
  type HttpPostOptions,
  type HttpPingOptions,
} from './protocols/http.js';
export { FtpClient, FTP_INIT_FAILURE, type FtpAuthOptions, type FtpWalkOptions } from './protocols/ftp.js';
export { SmtpClient, type MailMessage } from './protocols/smtp.js';
export { TelnetClient, type TelnetCallOptions } from './protocols/telnet.js';
export { TorClient, type TorRequestOptions, type TorPostOptions, type TorPingOptions } from './protocols/tor.js';

// ============================================================================
// Engines
// ============================================================================

export { UndiciEngine, createSessionAgent, describeHttpError, type HttpRequest, type HttpMethod } from './transport/undici.js';
export { FtpEngine, type FtpRequest, type FtpTransferMode } from './transport/ftp.js';
export { SmtpEngine, DotStuffer, extractAddress, type SmtpRequest, type SmtpTlsPolicy } from './transport/smtp.js';
export { TelnetEngine, TelnetNegotiator, parseTelnetOptions, type TelnetRequest, type TelnetOptions } from './transport/telnet.js';
export { parseSocksUrl, isSocksUrl, type SocksEndpoint } from './transport/socks.js';

// ============================================================================
// Parsing and assembly
// ============================================================================

export { parseHeaderLine, parseStatusLine, parseSetCookie, formatCookieHeader, type HeaderTarget, type StatusLine } from './utils/header-parser.js';
export { parseListLine, type ListingEntry } from './utils/ftp-list.js';
export { splitLines } from './utils/lines.js';
export { walkTree, type DirectoryLister, type WalkOptions } from './utils/tree-walker.js';
export { extractUrlPath, basename } from './utils/url-path.js';
export {
  MAIL_BOUNDARY,
  buildMailParts,
  assembleMail,
  assembleFlatMail,
  composeMail,
  type MimePart,
  type MailEnvelope,
} from './utils/mime.js';
export { assembleFormData, buildFormParts, verifyReadable, type FormPart, type AssembledForm } from './utils/multipart.js';
export { PayloadSource } from './utils/payload-source.js';

// ============================================================================
// Errors and logging
// ============================================================================

export {
  WirekitError,
  TimeoutError,
  ConnectionError,
  AuthenticationError,
  ProtocolError,
  StateError,
  ConfigurationError,
  LocalFileError,
  type TimeoutPhase,
} from './core/errors.js';
export { consoleLogger, silentLogger, createLevelLogger, type Logger, type LogLevel } from './types/logger.js';
export { ConsoleLogger, type ConsoleLoggerOptions } from './utils/logger.js';
export { VERSION } from './constants.js';
