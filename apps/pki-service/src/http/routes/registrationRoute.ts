import {scopeRequest} from '@adhoc-pki/logging'

import {readConfigurationBody, sendArchitectureBundle} from '../../http'
import type {RouteLogicHandler} from './types'

export const handleRegistrationRoute: RouteLogicHandler = async context => {
  const {request, runtime} = context
  const rawConfig = await readConfigurationBody({request, maxBodyBytes: runtime.config.maxBodyBytes})
  const architecture = await runtime.registrar.register(rawConfig)

  scopeRequest({arch_label: architecture.label})
  runtime.architectureStore.remember(architecture)

  sendArchitectureBundle(context, architecture)
}
