import {randomUUID} from 'node:crypto'
import type {IncomingMessage, ServerResponse} from 'node:http'

import {createNoopLogger, runWithRequestContext, scopeRequest, type StructuredLogger} from '@adhoc-pki/logging'
import {isStoreUnavailableError} from '@adhoc-pki/store'

import type {ArchitectureRegistrar} from '../architectureRegistrar'
import type {ArchitectureStore} from '../architectureStore'
import type {ServiceConfig} from '../config'
import {matchRoute} from '../dispatcher'
import {internal, isAppError, isCorruptStoreEntryError, serviceUnavailable, type AppError} from '../errors'
import {correlationIdOf, sendFailure} from '../http'
import {
  handleArchitectureRoute,
  handleCertificateRoute,
  handleCertRepoCaRoute,
  handleCertRepoIssuedRoute
} from './routes/architectureRoute'
import {handleFallbackRoute, handleMethodNotAllowedRoute} from './routes/fallbackRoute'
import {handleHealthRoute} from './routes/healthRoute'
import {handleRegistrationRoute} from './routes/registrationRoute'
import type {PkiServiceRequestHandler, RouteHandlerContext, RouteRuntime} from './routes/types'

// Express hands over requests whose url was rewritten by mounted routers.
const getRawRequestUrl = (request: IncomingMessage) => {
  if ('originalUrl' in request && typeof request.originalUrl === 'string' && request.originalUrl.length > 0) {
    return request.originalUrl
  }

  return request.url ?? '/'
}

const parseUrl = (request: IncomingMessage) => {
  const host = request.headers.host ?? 'localhost'
  return new URL(getRawRequestUrl(request), `http://${host}`)
}

const sanitizeRouteForLog = ({rawUrl}: {rawUrl: string | undefined}) => {
  if (!rawUrl) {
    return '/'
  }

  const routeWithoutQuery = rawUrl.split('?', 1)[0] ?? ''
  const routeWithoutFragment = routeWithoutQuery.split('#', 1)[0] ?? ''
  return routeWithoutFragment.length > 0 ? routeWithoutFragment : '/'
}

const dispatchRoute = (context: RouteHandlerContext) => {
  const match = matchRoute({
    method: context.method,
    pathname: context.pathname,
    registrationPath: context.runtime.config.registrationPath
  })

  switch (match.kind) {
    case 'health':
      return handleHealthRoute(context, {})
    case 'registration':
      return handleRegistrationRoute(context, {})
    case 'architecture':
      return handleArchitectureRoute(context, {archLabel: match.archLabel})
    case 'certificate':
      return handleCertificateRoute(context, {archLabel: match.archLabel, certLabel: match.certLabel})
    case 'certRepoCa':
      return handleCertRepoCaRoute(context, {archLabel: match.archLabel, repoLabel: match.repoLabel})
    case 'certRepoIssued':
      return handleCertRepoIssuedRoute(context, {
        archLabel: match.archLabel,
        repoLabel: match.repoLabel,
        certLabel: match.certLabel
      })
    case 'methodNotAllowed':
      return handleMethodNotAllowedRoute(context, {allowedMethods: match.allowedMethods})
    case 'notFound':
      return handleFallbackRoute(context, {})
  }
}

export const createPkiServiceRequestHandler = ({
  config,
  registrar,
  architectureStore,
  logger = createNoopLogger(),
  now = () => new Date()
}: {
  config: ServiceConfig
  registrar: ArchitectureRegistrar
  architectureStore: ArchitectureStore
  logger?: StructuredLogger
  now?: () => Date
}): PkiServiceRequestHandler => {
  const runtime: RouteRuntime = {
    config,
    registrar,
    architectureStore
  }

  // Store outages are reported as such, never as a missing architecture.
  const toAppError = (error: unknown): AppError | undefined => {
    if (isAppError(error)) {
      return error
    }

    if (isStoreUnavailableError(error)) {
      logger.error({
        event: 'store.unavailable',
        component: 'shared_store',
        message: error.message,
        reason_code: 'store_unavailable',
        metadata: {
          operation: error.operation,
          key: error.key,
          error: error.cause
        }
      })
      return serviceUnavailable('store_unavailable', 'Shared store is unavailable')
    }

    if (isCorruptStoreEntryError(error)) {
      logger.error({
        event: 'store.entry_corrupt',
        component: 'shared_store',
        message: error.message,
        reason_code: error.code,
        metadata: {
          key: error.key,
          error: error.cause
        }
      })
      return internal(error.code, 'Shared store holds an unreadable certificate')
    }

    return undefined
  }

  return (request, response) => {
    const correlationId = correlationIdOf(request)
    const requestId = randomUUID()
    const startedAtMs = now().getTime()
    const requestMethod = request.method ?? 'GET'

    return runWithRequestContext(
      {
        correlation_id: correlationId,
        request_id: requestId,
        method: requestMethod
      },
      async () => {
        let pathname = '/'
        let responseReasonCode: string | undefined

        logger.info({
          event: 'request.received',
          component: 'http.server',
          message: 'Request received',
          route: sanitizeRouteForLog({rawUrl: getRawRequestUrl(request)}),
          method: requestMethod
        })

        try {
          const url = parseUrl(request)
          pathname = url.pathname

          scopeRequest({route: pathname})

          await dispatchRoute({
            request,
            response,
            correlationId,
            method: requestMethod,
            pathname,
            runtime
          })
        } catch (error) {
          const appError = toAppError(error)
          if (appError) {
            responseReasonCode = appError.code
            logger.warn({
              event: 'request.rejected',
              component: 'http.server',
              message: appError.message,
              reason_code: appError.code,
              route: pathname,
              method: requestMethod
            })

            sendFailure({response, correlationId}, appError)
            return
          }

          responseReasonCode = 'internal_error'
          logger.error({
            event: 'request.failed',
            component: 'http.server',
            message: 'Unexpected internal error',
            reason_code: 'internal_error',
            route: pathname,
            method: requestMethod,
            metadata: {
              error
            }
          })

          sendFailure({response, correlationId}, internal('internal_error', 'Unexpected internal error'))
        } finally {
          const durationMs = Math.max(0, now().getTime() - startedAtMs)
          const statusCode = response.statusCode
          const baseLog = {
            event: 'request.completed',
            component: 'http.server',
            message: 'Request completed',
            route: pathname,
            method: requestMethod,
            status_code: statusCode,
            duration_ms: durationMs,
            ...(responseReasonCode ? {reason_code: responseReasonCode} : {})
          }

          if (statusCode >= 500) {
            logger.error(baseLog)
          } else if (statusCode >= 400) {
            logger.warn(baseLog)
          } else {
            logger.info(baseLog)
          }
        }
      }
    )
  }
}
