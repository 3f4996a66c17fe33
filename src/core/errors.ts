export class WirekitError extends Error {
  suggestions: string[];
  retriable: boolean;

  constructor(
    message: string,
    suggestions: string[] = [],
    retriable = false
  ) {
    super(message);
    this.name = 'WirekitError';
    this.suggestions = suggestions;
    this.retriable = retriable;
  }
}

/**
 * Timeout phases for granular error reporting
 */
export type TimeoutPhase =
  | 'connect'       // TCP connection
  | 'secureConnect' // TLS handshake
  | 'reply'         // Waiting for a server reply line
  | 'transfer'      // Data connection / body transfer
  | 'operation';    // Total operation time

/**
 * Timeout error with phase information
 */
export class TimeoutError extends WirekitError {
  phase: TimeoutPhase;
  timeout: number;

  constructor(options?: { phase?: TimeoutPhase; timeout?: number }) {
    const phase = options?.phase ?? 'operation';
    const timeout = options?.timeout;

    const phaseMessages: Record<TimeoutPhase, string> = {
      connect: 'Connection timed out',
      secureConnect: 'TLS handshake timed out',
      reply: 'Waiting for server reply timed out',
      transfer: 'Data transfer timed out',
      operation: 'Operation timed out'
    };

    let message = phaseMessages[phase];
    if (timeout !== undefined) {
      message += ` after ${timeout}ms`;
    }

    super(
      message,
      [
        'Verify network connectivity and DNS resolution for the target host.',
        'Increase the timeout if the server is slow to respond.'
      ],
      true
    );
    this.name = 'TimeoutError';
    this.phase = phase;
    this.timeout = timeout ?? 0;
  }
}

/**
 * Error thrown when connection to a service fails
 */
export class ConnectionError extends WirekitError {
  host?: string;
  port?: number;
  code?: string;

  constructor(
    message: string,
    options?: {
      host?: string;
      port?: number;
      code?: string;
      retriable?: boolean;
    }
  ) {
    super(
      message,
      [
        'Verify the host and port are correct and the service is running.',
        'Ensure the service is accepting connections on the specified port.'
      ],
      options?.retriable ?? true
    );
    this.name = 'ConnectionError';
    this.host = options?.host;
    this.port = options?.port;
    this.code = options?.code;
  }
}

/**
 * Error thrown when the server rejects the supplied credentials
 */
export class AuthenticationError extends WirekitError {
  authType?: string;

  constructor(message: string, options?: { authType?: string }) {
    super(
      message,
      [
        'Verify the username and password.',
        'Ensure the authentication method matches what the server expects.'
      ],
      false
    );
    this.name = 'AuthenticationError';
    this.authType = options?.authType;
  }
}

/**
 * Error thrown when a server replies with a negative completion code
 */
export class ProtocolError extends WirekitError {
  protocol: string;
  code?: string | number;
  phase?: string;

  constructor(
    message: string,
    options: {
      protocol: string;
      code?: string | number;
      phase?: string;
      retriable?: boolean;
    }
  ) {
    const protocolSuggestions: Record<string, string[]> = {
      ftp: [
        'Check file/directory permissions on the server.',
        'Verify the path exists and is correct.'
      ],
      smtp: [
        'Check that the sender is allowed to relay through this server.',
        'Verify the recipient address.'
      ],
      telnet: [
        'Check the telnet option strings.',
        'Ensure the expected prompts match the server output.'
      ],
      socks: [
        'Verify the SOCKS proxy is running and reachable.',
        'Check that the proxy allows connections to the destination.'
      ]
    };

    const suggestions = protocolSuggestions[options.protocol.toLowerCase()] ?? [
      'Verify the server supports the requested operation.',
      'Review the error code for specific guidance.'
    ];

    super(message, suggestions, options.retriable ?? false);
    this.name = 'ProtocolError';
    this.protocol = options.protocol;
    this.code = options.code;
    this.phase = options.phase;
  }
}

/**
 * Error thrown when a state precondition is not met
 */
export class StateError extends WirekitError {
  expectedState?: string;
  actualState?: string;

  constructor(
    message: string,
    options?: {
      expectedState?: string;
      actualState?: string;
    }
  ) {
    super(
      message,
      [
        'Ensure the session was opened before use.',
        'Check that operations are called in the correct order.'
      ],
      false
    );
    this.name = 'StateError';
    this.expectedState = options?.expectedState;
    this.actualState = options?.actualState;
  }
}

/**
 * Error thrown when configuration is invalid or missing
 */
export class ConfigurationError extends WirekitError {
  configKey?: string;

  constructor(message: string, options?: { configKey?: string }) {
    super(
      message,
      [
        'Check the session options or WIREKIT_* environment variables.',
        'Verify the configuration values are in the correct format.'
      ],
      false
    );
    this.name = 'ConfigurationError';
    this.configKey = options?.configKey;
  }
}

/**
 * Error thrown when a local file cannot be opened, read or written
 */
export class LocalFileError extends WirekitError {
  path: string;

  constructor(message: string, path: string) {
    super(
      message,
      [
        'Check that the file exists and the process can access it.',
        'Verify the parent directory exists for files being written.'
      ],
      false
    );
    this.name = 'LocalFileError';
    this.path = path;
  }
}

/**
 * Reduce anything thrown inside an engine to the short message stored
 * on a response.
 */
export function describeError(error: unknown, fallback: string): string {
  if (error instanceof Error && error.message) {
    return error.message;
  }
  return fallback;
}
