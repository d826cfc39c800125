import { SessionError } from '../domain/errors/session.error.js';

export interface LinkDescriptor {
  port: number;
  token: string;
}

/**
 * Extract the forwarded port and auth token from a notebook link such as
 * `http://localhost:8888/?token=abc123`.
 *
 * The port must be explicit. WHATWG URL parsing drops a port equal to the
 * scheme default (`https://host:443/`), so such links are rejected too.
 */
export function parseLink(link: string): LinkDescriptor {
  let url: URL;
  try {
    url = new URL(link);
  } catch (error) {
    throw new SessionError('InvalidLink', `Incorrect Jupyter link format: cannot parse '${link}'.`, { cause: error });
  }

  if (!url.port) {
    throw new SessionError('InvalidLink', 'Incorrect Jupyter link format: no port in URL.');
  }

  const port = Number(url.port);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new SessionError('InvalidLink', `Incorrect Jupyter link format: port ${url.port} is out of range.`);
  }

  const token = url.searchParams.get('token');
  if (token === null) {
    throw new SessionError('InvalidLink', 'Incorrect Jupyter link format: cannot determine authentication token.');
  }

  return { port, token };
}
