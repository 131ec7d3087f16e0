/**
 * HTTP client for the ad-hoc PKI service.
 *
 * Test harnesses submit an architecture configuration once and get back the
 * materialized certificates, keys and service endpoints. Any worker of the
 * service can later serve the same architecture by its label.
 */

import {promises as fs} from 'node:fs';

import {ErrorResponseSchema} from '@adhoc-pki/schemas';

import {parseArchitectureBundle, type ArchitectureContext} from './architectureContext';
import {PkiServiceClientError} from './errors';

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export type PkiServiceClient = {
  submitConfiguration: (configuration: string | Uint8Array) => Promise<ArchitectureContext>;
  fetchArchitecture: (archLabel: string) => Promise<ArchitectureContext>;
};

export type PkiServiceClientOptions = {
  baseUrl: string;
  registrationPath?: string;
  fetchImpl?: FetchLike;
};

const readJsonBody = async (response: Response): Promise<unknown> => {
  const contentType = response.headers.get('content-type');
  if (!contentType || !contentType.toLowerCase().includes('application/json')) {
    throw new PkiServiceClientError({
      code: 'invalid_response',
      message: `Expected a JSON response, received ${contentType ?? 'no content type'}`,
      status: response.status
    });
  }

  try {
    return await response.json();
  } catch (error) {
    throw new PkiServiceClientError({
      code: 'invalid_response',
      message: 'Response body is not valid JSON',
      status: response.status,
      cause: error
    });
  }
};

const toClientError = async (response: Response) => {
  let body: unknown;
  try {
    body = await readJsonBody(response);
  } catch {
    return new PkiServiceClientError({
      code: 'http_error',
      message: `Request failed with status ${response.status}`,
      status: response.status
    });
  }

  const parsed = ErrorResponseSchema.safeParse(body);
  if (!parsed.success) {
    return new PkiServiceClientError({
      code: 'http_error',
      message: `Request failed with status ${response.status}`,
      status: response.status
    });
  }

  return new PkiServiceClientError({
    code: parsed.data.error,
    message: parsed.data.message,
    status: response.status,
    correlationId: parsed.data.correlation_id
  });
};

export const createPkiServiceClient = ({
  baseUrl,
  registrationPath = '/config',
  fetchImpl = fetch
}: PkiServiceClientOptions): PkiServiceClient => {
  const root = baseUrl.replace(/\/+$/u, '');

  const send = async ({path, init}: {path: string; init: RequestInit}) => {
    let response: Response;
    try {
      response = await fetchImpl(`${root}${path}`, init);
    } catch (error) {
      throw new PkiServiceClientError({
        code: 'service_unreachable',
        message: `PKI service request to ${path} could not be completed`,
        status: 0,
        cause: error
      });
    }

    if (!response.ok) {
      throw await toClientError(response);
    }

    return parseArchitectureBundle({body: await readJsonBody(response), status: response.status});
  };

  return {
    submitConfiguration: configuration =>
      send({
        path: registrationPath,
        init: {
          method: 'POST',
          headers: {'content-type': 'application/yaml', accept: 'application/json'},
          // bytes are hashed server-side, so they are sent untouched
          body: typeof configuration === 'string' ? configuration : Uint8Array.from(configuration)
        }
      }),
    fetchArchitecture: archLabel =>
      send({
        path: `/${encodeURIComponent(archLabel)}`,
        init: {method: 'GET', headers: {accept: 'application/json'}}
      })
  };
};

export const loadConfigurationFile = (filePath: string): Promise<Buffer> => fs.readFile(filePath);
