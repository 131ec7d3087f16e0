import {methodNotAllowed, notFound} from '../../errors'
import type {RouteLogicHandler} from './types'

export const handleFallbackRoute: RouteLogicHandler = ({method, pathname}) => {
  throw notFound('route_not_found', `Unsupported route ${method} ${pathname}`)
}

export const handleMethodNotAllowedRoute: RouteLogicHandler<{allowedMethods: string[]}> = (
  {method, pathname},
  {allowedMethods}
) => {
  throw methodNotAllowed('method_not_allowed', `Method ${method} is not allowed on ${pathname}`, allowedMethods)
}
