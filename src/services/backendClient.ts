/**
 * Authenticated Backend Client
 *
 * One long-lived undici dispatcher presenting the configured mutual-TLS
 * identity, optionally through an upstream proxy. Adapters only see the
 * BackendClient interface so tests can swap in a stub.
 */

import fs from 'fs';
import { X509Certificate, createPrivateKey } from 'crypto';
import { Agent, ProxyAgent, request, type Dispatcher } from 'undici';
import type { BackendConfig } from './config.js';
import { ConfigError } from './errors.js';
import { defaultLogger, type Logger } from './logger.js';

export interface BackendResponse {
  status: number;
  body: string;
}

export interface BackendRequestOptions {
  signal?: AbortSignal;
}

export interface BackendClient {
  /** POST a JSON body to the backend endpoint */
  post(body: unknown, options?: BackendRequestOptions): Promise<BackendResponse>;
  close(): Promise<void>;
}

export interface ClientIdentity {
  cert: string;
  key: string;
}

/**
 * Backend client over an undici dispatcher
 */
export class UndiciBackendClient implements BackendClient {
  constructor(
    private readonly endpoint: string,
    private readonly dispatcher: Dispatcher
  ) {}

  async post(body: unknown, options: BackendRequestOptions = {}): Promise<BackendResponse> {
    const response = await request(this.endpoint, {
      method: 'POST',
      headers: {
        'content-type': 'application/json',
        accept: 'application/json',
      },
      body: JSON.stringify(body),
      dispatcher: this.dispatcher,
      signal: options.signal,
    });

    return {
      status: response.statusCode,
      body: await response.body.text(),
    };
  }

  async close(): Promise<void> {
    await this.dispatcher.close();
  }
}

/**
 * Warn when an identity file is readable by group or others
 */
export function checkIdentityFilePermissions(filePath: string, logger: Logger = defaultLogger): void {
  const mode = fs.statSync(filePath).mode;
  if (mode & 0o044) {
    logger.warn('Identity file is readable by group or others', {
      file: filePath,
      mode: (mode & 0o777).toString(8),
    });
  }
}

function readIdentityFile(filePath: string, label: string): string {
  try {
    return fs.readFileSync(filePath, 'utf8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Failed to read client ${label} ${filePath}: ${reason}`);
  }
}

/**
 * Check that the PEM text holds a usable private key and certificate
 *
 * @throws ConfigError naming the part that failed to parse
 */
export function parseIdentity(cert: string, key: string): ClientIdentity {
  try {
    createPrivateKey(key);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Failed to parse client private key: ${reason}`);
  }

  try {
    new X509Certificate(cert);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Failed to parse client certificate: ${reason}`);
  }

  return { cert, key };
}

/**
 * Read, permission-check and parse the PEM identity files
 */
export function loadIdentity(auth: BackendConfig['auth'], logger: Logger = defaultLogger): ClientIdentity {
  const cert = readIdentityFile(auth.certFile, 'certificate');
  const key = readIdentityFile(auth.keyFile, 'private key');

  checkIdentityFilePermissions(auth.certFile, logger);
  checkIdentityFilePermissions(auth.keyFile, logger);

  return parseIdentity(cert, key);
}

/**
 * Pick the upstream proxy matching the endpoint's scheme
 */
export function selectProxy(endpoint: string, proxies: BackendConfig['proxies']): string | undefined {
  const protocol = new URL(endpoint).protocol;
  if (protocol === 'https:') return proxies.https;
  if (protocol === 'http:') return proxies.http;
  return undefined;
}

/**
 * Build the dispatcher carrying the identity and timeouts
 */
export function createDispatcher(backend: BackendConfig, identity: ClientIdentity): Dispatcher {
  const timeouts = {
    headersTimeout: backend.timeoutMs,
    bodyTimeout: backend.timeoutMs,
  };

  const proxy = selectProxy(backend.endpoint, backend.proxies);
  if (proxy) {
    return new ProxyAgent({
      uri: proxy,
      requestTls: { cert: identity.cert, key: identity.key },
      ...timeouts,
    });
  }

  return new Agent({
    connect: { cert: identity.cert, key: identity.key },
    ...timeouts,
  });
}

/**
 * Build the process-wide client for the configured backend
 *
 * @throws ConfigError when the identity cannot be read or parsed
 */
export function createAuthenticatedClient(backend: BackendConfig, logger: Logger = defaultLogger): BackendClient {
  const identity = loadIdentity(backend.auth, logger);
  const dispatcher = createDispatcher(backend, identity);

  logger.info('Backend client ready', {
    endpoint: backend.endpoint,
    proxied: selectProxy(backend.endpoint, backend.proxies) !== undefined,
    timeoutMs: backend.timeoutMs,
  });

  return new UndiciBackendClient(backend.endpoint, dispatcher);
}
