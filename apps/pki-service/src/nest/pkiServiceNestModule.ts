import {All, Controller, Inject, Module, Req, Res, type DynamicModule} from '@nestjs/common'
import type {Request, Response} from 'express'

import type {StructuredLogger} from '@adhoc-pki/logging'

import type {ArchitectureRegistrar} from '../architectureRegistrar'
import type {ArchitectureStore} from '../architectureStore'
import type {ServiceConfig} from '../config'
import {createPkiServiceRequestHandler} from '../http/requestHandler'
import type {PkiServiceRequestHandler} from '../http/routes/types'
import {
  PKI_SERVICE_ARCHITECTURE_STORE,
  PKI_SERVICE_CONFIG,
  PKI_SERVICE_LOGGER,
  PKI_SERVICE_NOW,
  PKI_SERVICE_REGISTRAR,
  PKI_SERVICE_REQUEST_HANDLER
} from './tokens'

export type PkiServiceNestModuleOptions = {
  config: ServiceConfig
  registrar: ArchitectureRegistrar
  architectureStore: ArchitectureStore
  logger: StructuredLogger
  now?: () => Date
}

// Routing is done by the dispatcher, so one catch-all controller suffices.
@Controller()
export class PkiServiceController {
  public constructor(
    @Inject(PKI_SERVICE_REQUEST_HANDLER)
    private readonly requestHandler: PkiServiceRequestHandler
  ) {}

  @All('*')
  public async handle(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.requestHandler(request, response)
  }
}

@Module({
  controllers: [PkiServiceController]
})
export class PkiServiceNestModule {
  public static register(options: PkiServiceNestModuleOptions): DynamicModule {
    return {
      module: PkiServiceNestModule,
      providers: [
        {
          provide: PKI_SERVICE_CONFIG,
          useValue: options.config
        },
        {
          provide: PKI_SERVICE_REGISTRAR,
          useValue: options.registrar
        },
        {
          provide: PKI_SERVICE_ARCHITECTURE_STORE,
          useValue: options.architectureStore
        },
        {
          provide: PKI_SERVICE_LOGGER,
          useValue: options.logger
        },
        {
          provide: PKI_SERVICE_NOW,
          useValue: options.now ?? null
        },
        {
          provide: PKI_SERVICE_REQUEST_HANDLER,
          inject: [
            PKI_SERVICE_CONFIG,
            PKI_SERVICE_REGISTRAR,
            PKI_SERVICE_ARCHITECTURE_STORE,
            PKI_SERVICE_LOGGER,
            PKI_SERVICE_NOW
          ],
          useFactory: (
            config: ServiceConfig,
            registrar: ArchitectureRegistrar,
            architectureStore: ArchitectureStore,
            logger: StructuredLogger,
            now: (() => Date) | null
          ) =>
            createPkiServiceRequestHandler({
              config,
              registrar,
              architectureStore,
              logger,
              ...(now ? {now} : {})
            })
        }
      ]
    }
  }
}
