import {sendHealth} from '../../http'
import type {RouteLogicHandler} from './types'

export const handleHealthRoute: RouteLogicHandler = context => {
  sendHealth(context)
}
