import {randomUUID} from 'node:crypto'
import type {IncomingMessage, ServerResponse} from 'node:http'

import {toArchitectureBundle, type BuiltArchitecture, type IssuedCertificate} from '@adhoc-pki/pki'
import {ArchitectureBundleSchema, ErrorResponseSchema, HealthResponseSchema} from '@adhoc-pki/schemas'

import {badRequest, unsupportedMediaType, type AppError} from './errors'

const JSON_CONTENT_TYPE = 'application/json; charset=utf-8'
const CERTIFICATE_CONTENT_TYPE = 'application/pkix-cert'

// printable ASCII without spaces, so the id can be echoed back as a header
const CORRELATION_ID_PATTERN = /^[\x21-\x7e]{1,128}$/u

// form encodings would mangle the configuration bytes before they are hashed
const FORM_CONTENT_TYPES = ['multipart/form-data', 'application/x-www-form-urlencoded']

export const correlationIdOf = (request: IncomingMessage) => {
  const header = request.headers['x-correlation-id']
  const candidate = (Array.isArray(header) ? header[0] : header)?.trim()
  return candidate && CORRELATION_ID_PATTERN.test(candidate) ? candidate : randomUUID()
}

const bodyTooLarge = (maxBodyBytes: number) =>
  badRequest('request_body_too_large', `Request body exceeds ${maxBodyBytes} bytes`)

/**
 * Reads a configuration upload verbatim: these bytes are what the
 * architecture label is derived from. Any content type but a form encoding
 * is accepted.
 */
export const readConfigurationBody = async ({
  request,
  maxBodyBytes
}: {
  request: IncomingMessage
  maxBodyBytes: number
}) => {
  const contentType = request.headers['content-type']?.toLowerCase() ?? ''
  if (FORM_CONTENT_TYPES.some(formType => contentType.startsWith(formType))) {
    throw unsupportedMediaType('content_type_invalid', 'Configuration must be sent as a raw request body')
  }

  const declaredLength = Number(request.headers['content-length'])
  if (Number.isFinite(declaredLength) && declaredLength > maxBodyBytes) {
    throw bodyTooLarge(maxBodyBytes)
  }

  const chunks: Buffer[] = []
  let received = 0
  for await (const chunk of request) {
    const bytes = typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : Buffer.from(chunk)
    received += bytes.length
    if (received > maxBodyBytes) {
      throw bodyTooLarge(maxBodyBytes)
    }
    chunks.push(bytes)
  }

  if (received === 0) {
    throw badRequest('request_body_missing', 'Request body is required')
  }

  return Buffer.concat(chunks, received)
}

export const decodePathParam = (value: string) => {
  try {
    return decodeURIComponent(value)
  } catch {
    throw badRequest('path_param_invalid', 'Path parameter encoding is invalid')
  }
}

type Reply = {
  status: number
  contentType: string
  body: Buffer
  headers?: Record<string, string>
}

// Bundles carry private keys: nothing this service sends may be cached.
const reply = ({response, correlationId}: {response: ServerResponse; correlationId: string}, payload: Reply) => {
  response.writeHead(payload.status, {
    'cache-control': 'no-store',
    'x-content-type-options': 'nosniff',
    'content-type': payload.contentType,
    'content-length': String(payload.body.length),
    'x-correlation-id': correlationId,
    ...payload.headers
  })
  response.end(payload.body)
}

const json = (value: unknown) => Buffer.from(JSON.stringify(value), 'utf8')

export type ResponseTarget = {response: ServerResponse; correlationId: string}

export const sendArchitectureBundle = (target: ResponseTarget, architecture: BuiltArchitecture) =>
  reply(target, {
    status: 200,
    contentType: JSON_CONTENT_TYPE,
    body: json(ArchitectureBundleSchema.parse(toArchitectureBundle(architecture)))
  })

export const sendCertificate = (target: ResponseTarget, issued: Pick<IssuedCertificate, 'der'>) =>
  reply(target, {status: 200, contentType: CERTIFICATE_CONTENT_TYPE, body: issued.der})

export const sendHealth = (target: ResponseTarget) =>
  reply(target, {status: 200, contentType: JSON_CONTENT_TYPE, body: json(HealthResponseSchema.parse({status: 'ok'}))})

export const sendFailure = (target: ResponseTarget, failure: Pick<AppError, 'status' | 'code' | 'message' | 'headers'>) =>
  reply(target, {
    status: failure.status,
    contentType: JSON_CONTENT_TYPE,
    body: json(
      ErrorResponseSchema.parse({
        error: failure.code,
        message: failure.message,
        correlation_id: target.correlationId
      })
    ),
    headers: failure.headers
  })
