/**
 * Mock FTP Server
 *
 * A small in-process FTP server over a virtual file system, for testing
 * the FTP client without a network. Passive mode only.
 *
 * @example
 * ```typescript
 * import { MockFtpServer } from 'wirekit/testing';
 *
 * const server = await MockFtpServer.create();
 * server.addFile('/pub/readme.txt', 'Hello, World!');
 *
 * const res = await session.ftp.read(`${server.url}/pub/readme.txt`);
 *
 * await server.stop();
 * ```
 */

import { EventEmitter } from 'node:events';
import * as net from 'node:net';
import { posix } from 'node:path';

// ============================================
// Types
// ============================================

export interface MockFtpServerOptions {
  /**
   * Port to listen on (control connection); 0 picks a free one
   * @default 0
   */
  port?: number;

  /**
   * Host to bind to
   * @default '127.0.0.1'
   */
  host?: string;

  /**
   * Anonymous login allowed
   * @default true
   */
  anonymous?: boolean;

  /**
   * Username for authenticated access
   * @default 'user'
   */
  username?: string;

  /**
   * Password for authenticated access
   * @default 'test-secret'
   */
  password?: string;

  /**
   * Welcome message
   * @default 'wirekit mock FTP server'
   */
  welcomeMessage?: string;

  /**
   * Response delay in ms
   * @default 0
   */
  delay?: number;
}

export interface VirtualFile {
  content: Buffer;
  modified: Date;
  isDirectory: boolean;
}

interface FtpSession {
  id: string;
  socket: net.Socket;
  authenticated: boolean;
  username: string | null;
  currentDir: string;
  renameFrom: string | null;
  dataConnection: Promise<net.Socket | null> | null;
  /** Commands of one session are handled strictly in order */
  queue: Promise<void>;
}

export interface MockFtpStats {
  connectionsTotal: number;
  commandsReceived: number;
  filesDownloaded: number;
  filesUploaded: number;
  bytesTransferred: number;
  commandLog: Array<{ command: string; sessionId: string; timestamp: number }>;
}

const DATA_CONNECT_TIMEOUT_MS = 5000;

// ============================================
// MockFtpServer
// ============================================

export class MockFtpServer extends EventEmitter {
  private options: Required<MockFtpServerOptions>;
  private server: net.Server | null = null;
  private sessions: Map<string, FtpSession> = new Map();
  private dataServers: Set<net.Server> = new Set();
  private files: Map<string, VirtualFile> = new Map();
  private started = false;
  private sessionCounter = 0;
  private _port = 0;
  private stats: MockFtpStats = {
    connectionsTotal: 0,
    commandsReceived: 0,
    filesDownloaded: 0,
    filesUploaded: 0,
    bytesTransferred: 0,
    commandLog: [],
  };

  constructor(options: MockFtpServerOptions = {}) {
    super();

    this.options = {
      port: 0,
      host: '127.0.0.1',
      anonymous: true,
      username: 'user',
      password: 'test-secret',
      welcomeMessage: 'wirekit mock FTP server',
      delay: 0,
      ...options,
    };

    this.files.set('/', { content: Buffer.alloc(0), modified: new Date(), isDirectory: true });
  }

  // ============================================
  // Properties
  // ============================================

  get isRunning(): boolean {
    return this.started;
  }

  get port(): number {
    return this._port;
  }

  get host(): string {
    return this.options.host;
  }

  get url(): string {
    return `ftp://${this.options.host}:${this._port}`;
  }

  get statistics(): MockFtpStats {
    return { ...this.stats };
  }

  /** Every command received, in order, across sessions */
  get commands(): string[] {
    return this.stats.commandLog.map((entry) => entry.command);
  }

  // ============================================
  // Virtual File System
  // ============================================

  /**
   * Add a file, creating missing parent directories
   */
  addFile(path: string, content: string | Buffer): void {
    const normalized = posix.resolve('/', path);
    this.addDirectory(posix.dirname(normalized));
    this.files.set(normalized, {
      content: typeof content === 'string' ? Buffer.from(content) : content,
      modified: new Date(),
      isDirectory: false,
    });
  }

  /**
   * Add a directory and its missing parents
   */
  addDirectory(path: string): void {
    const normalized = posix.resolve('/', path);
    if (normalized !== '/') {
      this.addDirectory(posix.dirname(normalized));
    }
    if (!this.files.has(normalized)) {
      this.files.set(normalized, { content: Buffer.alloc(0), modified: new Date(), isDirectory: true });
    }
  }

  getFile(path: string): VirtualFile | undefined {
    return this.files.get(posix.resolve('/', path));
  }

  hasFile(path: string): boolean {
    return this.files.has(posix.resolve('/', path));
  }

  /**
   * Direct children of a directory, in insertion order
   */
  private listDirectory(path: string): Array<{ name: string; file: VirtualFile }> {
    const dir = posix.resolve('/', path);
    const entries: Array<{ name: string; file: VirtualFile }> = [];

    for (const [filePath, file] of this.files) {
      if (filePath !== dir && posix.dirname(filePath) === dir) {
        entries.push({ name: posix.basename(filePath), file });
      }
    }

    return entries;
  }

  // ============================================
  // Lifecycle
  // ============================================

  async start(): Promise<void> {
    if (this.started) {
      throw new Error('Server already started');
    }

    const server = net.createServer((socket) => this.handleConnection(socket));
    this.server = server;

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.options.port, this.options.host, () => {
        server.removeListener('error', reject);
        const address = server.address();
        this._port = typeof address === 'object' && address ? address.port : 0;
        this.started = true;
        this.emit('listening', this._port);
        resolve();
      });
    });
  }

  async stop(): Promise<void> {
    if (!this.started || !this.server) return;

    for (const session of this.sessions.values()) {
      session.socket.destroy();
    }
    this.sessions.clear();

    for (const dataServer of this.dataServers) {
      dataServer.close();
    }
    this.dataServers.clear();

    const server = this.server;
    await new Promise<void>((resolve) => {
      server.close(() => resolve());
    });

    this.server = null;
    this.started = false;
    this.emit('close');
  }

  reset(): void {
    this.files.clear();
    this.files.set('/', { content: Buffer.alloc(0), modified: new Date(), isDirectory: true });
    this.stats = {
      connectionsTotal: 0,
      commandsReceived: 0,
      filesDownloaded: 0,
      filesUploaded: 0,
      bytesTransferred: 0,
      commandLog: [],
    };
    this.emit('reset');
  }

  // ============================================
  // Connection Handling
  // ============================================

  private handleConnection(socket: net.Socket): void {
    const sessionId = `ftp-${++this.sessionCounter}`;
    const session: FtpSession = {
      id: sessionId,
      socket,
      authenticated: false,
      username: null,
      currentDir: '/',
      renameFrom: null,
      dataConnection: null,
      queue: Promise.resolve(),
    };

    this.sessions.set(sessionId, session);
    this.stats.connectionsTotal++;
    this.emit('connect', sessionId);

    this.send(socket, 220, this.options.welcomeMessage);

    let buffer = '';
    socket.on('data', (chunk: Buffer) => {
      buffer += chunk.toString('utf8');

      let newline = buffer.indexOf('\n');
      while (newline !== -1) {
        const line = buffer.substring(0, newline).replace(/\r$/, '');
        buffer = buffer.substring(newline + 1);
        if (line) {
          session.queue = session.queue
            .then(() => this.handleCommand(session, line))
            .catch((err: unknown) => {
              socket.destroy(err instanceof Error ? err : undefined);
            });
        }
        newline = buffer.indexOf('\n');
      }
    });

    socket.on('close', () => {
      this.sessions.delete(sessionId);
      this.emit('disconnect', sessionId);
    });

    // Clients drop connections without QUIT all the time
    socket.on('error', () => socket.destroy());
  }

  private async handleCommand(session: FtpSession, line: string): Promise<void> {
    const space = line.indexOf(' ');
    const cmd = (space === -1 ? line : line.substring(0, space)).toUpperCase();
    const arg = space === -1 ? '' : line.substring(space + 1);

    this.stats.commandsReceived++;
    this.stats.commandLog.push({ command: line, sessionId: session.id, timestamp: Date.now() });
    this.emit('command', cmd, arg, session.id);

    if (this.options.delay > 0) {
      await new Promise((resolve) => setTimeout(resolve, this.options.delay));
    }

    const { socket } = session;

    switch (cmd) {
      case 'USER':
        return this.handleUser(session, arg);
      case 'PASS':
        return this.handlePass(session, arg);
      case 'QUIT':
        this.send(socket, 221, 'Goodbye');
        socket.end();
        return;
      case 'NOOP':
        this.send(socket, 200, 'OK');
        return;
      case 'SYST':
        this.send(socket, 215, 'UNIX Type: L8');
        return;
    }

    if (!session.authenticated) {
      this.send(socket, 530, 'Not logged in');
      return;
    }

    switch (cmd) {
      case 'PWD':
        this.send(socket, 257, `"${session.currentDir}" is current directory`);
        return;
      case 'CWD':
        return this.handleCwd(session, arg);
      case 'TYPE':
        this.send(socket, 200, `Type set to ${arg.toUpperCase()}`);
        return;
      case 'PASV':
        return this.handlePasv(session);
      case 'LIST':
      case 'NLST':
        return this.handleList(session, arg, cmd === 'NLST');
      case 'RETR':
        return this.handleRetr(session, arg);
      case 'STOR':
        return this.handleStor(session, arg);
      case 'SIZE':
        return this.handleSize(session, arg);
      case 'DELE':
        return this.handleDele(session, arg);
      case 'MKD':
        return this.handleMkd(session, arg);
      case 'RNFR':
        return this.handleRnfr(session, arg);
      case 'RNTO':
        return this.handleRnto(session, arg);
      default:
        this.send(socket, 502, `Command ${cmd} not implemented`);
    }
  }

  // ============================================
  // Command Handlers
  // ============================================

  private handleUser(session: FtpSession, username: string): void {
    session.username = username;
    session.authenticated = false;

    if (username === 'anonymous' && this.options.anonymous) {
      session.authenticated = true;
      this.send(session.socket, 230, 'Anonymous access granted');
      return;
    }
    this.send(session.socket, 331, 'Password required');
  }

  private handlePass(session: FtpSession, password: string): void {
    if (session.username === this.options.username && password === this.options.password) {
      session.authenticated = true;
      this.send(session.socket, 230, 'Login successful');
      return;
    }
    this.send(session.socket, 530, 'Login incorrect');
  }

  private handleCwd(session: FtpSession, arg: string): void {
    const path = this.resolvePath(session, arg);
    const entry = this.files.get(path);

    if (!entry?.isDirectory) {
      this.send(session.socket, 550, 'Failed to change directory');
      return;
    }
    session.currentDir = path;
    this.send(session.socket, 250, 'Directory successfully changed');
  }

  private handlePasv(session: FtpSession): Promise<void> {
    const dataServer = net.createServer();
    this.dataServers.add(dataServer);

    session.dataConnection = new Promise<net.Socket | null>((resolve) => {
      const timer = setTimeout(() => {
        dataServer.close();
        this.dataServers.delete(dataServer);
        resolve(null);
      }, DATA_CONNECT_TIMEOUT_MS);
      timer.unref();

      dataServer.once('connection', (socket: net.Socket) => {
        clearTimeout(timer);
        socket.on('error', () => socket.destroy());
        dataServer.close();
        this.dataServers.delete(dataServer);
        resolve(socket);
      });
    });

    return new Promise<void>((resolve) => {
      dataServer.listen(0, this.options.host, () => {
        const address = dataServer.address();
        const port = typeof address === 'object' && address ? address.port : 0;
        const host = this.options.host.split('.').join(',');
        this.send(
          session.socket,
          227,
          `Entering Passive Mode (${host},${Math.floor(port / 256)},${port % 256})`
        );
        resolve();
      });
    });
  }

  private async handleList(session: FtpSession, arg: string, namesOnly: boolean): Promise<void> {
    const path = this.resolvePath(session, arg);
    const entry = this.files.get(path);

    if (!entry) {
      this.rejectTransfer(session, 'No such file or directory');
      return;
    }

    const entries = entry.isDirectory
      ? this.listDirectory(path)
      : [{ name: posix.basename(path), file: entry }];

    const listing = entries
      .map(({ name, file }) => (namesOnly ? name : this.formatListLine(name, file)))
      .map((text) => `${text}\r\n`)
      .join('');

    await this.sendData(session, Buffer.from(listing), 'Directory send OK');
  }

  private async handleRetr(session: FtpSession, arg: string): Promise<void> {
    const path = this.resolvePath(session, arg);
    const entry = this.files.get(path);

    if (!entry || entry.isDirectory) {
      this.rejectTransfer(session, 'File not found');
      return;
    }

    await this.sendData(session, entry.content, 'Transfer complete');
    this.stats.filesDownloaded++;
    this.emit('download', path);
  }

  private async handleStor(session: FtpSession, arg: string): Promise<void> {
    const path = this.resolvePath(session, arg);
    const parent = this.files.get(posix.dirname(path));

    if (!parent?.isDirectory || this.files.get(path)?.isDirectory) {
      this.rejectTransfer(session, 'Cannot store file here');
      return;
    }

    const data = await this.takeDataConnection(session);
    if (!data) {
      this.send(session.socket, 425, "Can't open data connection");
      return;
    }

    this.send(session.socket, 150, 'Ok to send data');

    const chunks: Buffer[] = [];
    await new Promise<void>((resolve) => {
      data.on('data', (chunk: Buffer) => chunks.push(chunk));
      data.once('close', () => resolve());
    });

    const content = Buffer.concat(chunks);
    this.files.set(path, { content, modified: new Date(), isDirectory: false });
    this.stats.filesUploaded++;
    this.stats.bytesTransferred += content.length;
    this.emit('upload', path, content);

    this.send(session.socket, 226, 'Transfer complete');
  }

  private handleSize(session: FtpSession, arg: string): void {
    const entry = this.files.get(this.resolvePath(session, arg));

    if (!entry || entry.isDirectory) {
      this.send(session.socket, 550, 'Could not get file size');
      return;
    }
    this.send(session.socket, 213, String(entry.content.length));
  }

  private handleDele(session: FtpSession, arg: string): void {
    const path = this.resolvePath(session, arg);
    const entry = this.files.get(path);

    if (!entry || entry.isDirectory) {
      this.send(session.socket, 550, 'Delete operation failed');
      return;
    }
    this.files.delete(path);
    this.send(session.socket, 250, 'Delete operation successful');
  }

  private handleMkd(session: FtpSession, arg: string): void {
    const path = this.resolvePath(session, arg);

    if (this.files.has(path) || !this.files.get(posix.dirname(path))?.isDirectory) {
      this.send(session.socket, 550, 'Create directory operation failed');
      return;
    }
    this.files.set(path, { content: Buffer.alloc(0), modified: new Date(), isDirectory: true });
    this.send(session.socket, 257, `"${path}" created`);
  }

  private handleRnfr(session: FtpSession, arg: string): void {
    const path = this.resolvePath(session, arg);

    if (!this.files.has(path) || path === '/') {
      session.renameFrom = null;
      this.send(session.socket, 550, 'RNFR command failed');
      return;
    }
    session.renameFrom = path;
    this.send(session.socket, 350, 'Ready for RNTO');
  }

  private handleRnto(session: FtpSession, arg: string): void {
    const from = session.renameFrom;
    session.renameFrom = null;

    if (!from) {
      this.send(session.socket, 503, 'RNFR required first');
      return;
    }

    const to = this.resolvePath(session, arg);
    if (this.files.has(to) || !this.files.get(posix.dirname(to))?.isDirectory) {
      this.send(session.socket, 550, 'Rename failed');
      return;
    }

    const moved = [...this.files].filter(([path]) => path === from || path.startsWith(`${from}/`));
    for (const [path, file] of moved) {
      this.files.delete(path);
      this.files.set(to + path.substring(from.length), file);
    }
    this.send(session.socket, 250, 'Rename successful');
  }

  // ============================================
  // Helpers
  // ============================================

  private resolvePath(session: FtpSession, arg: string): string {
    return posix.resolve(session.currentDir, arg || '.');
  }

  private formatListLine(name: string, file: VirtualFile): string {
    const perms = file.isDirectory ? 'drwxr-xr-x' : '-rw-r--r--';
    const size = file.isDirectory ? 4096 : file.content.length;
    return `${perms} 1 user group ${String(size).padStart(8)} Jan  1 00:00 ${name}`;
  }

  private takeDataConnection(session: FtpSession): Promise<net.Socket | null> {
    const pending = session.dataConnection ?? Promise.resolve(null);
    session.dataConnection = null;
    return pending;
  }

  /**
   * Reply 550 and drop the data connection opened for the transfer
   */
  private rejectTransfer(session: FtpSession, message: string): void {
    this.send(session.socket, 550, message);
    void this.takeDataConnection(session).then((data) => data?.destroy());
  }

  private async sendData(session: FtpSession, content: Buffer, completion: string): Promise<void> {
    const data = await this.takeDataConnection(session);
    if (!data) {
      this.send(session.socket, 425, "Can't open data connection");
      return;
    }

    this.send(session.socket, 150, 'Opening data connection');
    await new Promise<void>((resolve) => {
      data.end(content, () => resolve());
    });
    this.stats.bytesTransferred += content.length;
    this.send(session.socket, 226, completion);
  }

  private send(socket: net.Socket, code: number, message: string): void {
    if (!socket.destroyed) {
      socket.write(`${code} ${message}\r\n`);
    }
  }

  // ============================================
  // Static factory
  // ============================================

  static async create(options: MockFtpServerOptions = {}): Promise<MockFtpServer> {
    const server = new MockFtpServer(options);
    await server.start();
    return server;
  }
}
