import type {IncomingMessage, ServerResponse} from 'node:http'

import type {ArchitectureRegistrar} from '../../architectureRegistrar'
import type {ArchitectureStore} from '../../architectureStore'
import type {ServiceConfig} from '../../config'

export type RouteRuntime = {
  config: ServiceConfig
  registrar: ArchitectureRegistrar
  architectureStore: ArchitectureStore
}

export type RouteHandlerContext = {
  request: IncomingMessage
  response: ServerResponse
  correlationId: string
  method: string
  pathname: string
  runtime: RouteRuntime
}

export type RouteLogicHandler<TParams = Record<never, never>> = (
  context: RouteHandlerContext,
  params: TParams
) => void | Promise<void>

export type PkiServiceRequestHandler = (request: IncomingMessage, response: ServerResponse) => Promise<void>
