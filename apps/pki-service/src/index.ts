import 'reflect-metadata'

import {fileURLToPath} from 'node:url'

import {createStructuredLogger} from '@adhoc-pki/logging'

import {appName, createPkiServiceApp} from './app'
import {loadConfig} from './config'

export * from './app'
export * from './architectureRegistrar'
export * from './architectureStore'
export * from './certificateCache'
export * from './config'
export * from './dispatcher'
export * from './errors'
export * from './http'
export * from './infrastructure'
export * from './storeKeys'
export {createPkiServiceRequestHandler} from './http/requestHandler'

const main = async () => {
  const config = loadConfig(process.env)
  const app = await createPkiServiceApp({config})

  await app.start()

  const shutdown = async () => {
    await app.stop()
    process.exit(0)
  }

  process.on('SIGINT', () => {
    void shutdown()
  })
  process.on('SIGTERM', () => {
    void shutdown()
  })
}

const isMainModule = (() => {
  const currentFile = fileURLToPath(import.meta.url)
  const entryFile = process.argv[1]
  if (!entryFile) {
    return false
  }

  return currentFile === entryFile
})()

if (isMainModule) {
  void main().catch(error => {
    const env = process.env.NODE_ENV === 'production' ? 'production' : process.env.NODE_ENV === 'test' ? 'test' : 'development'
    const startupLogger = createStructuredLogger({
      service: appName,
      env,
      level: 'error'
    })
    startupLogger.fatal({
      event: 'process.startup.failed',
      component: 'process.entrypoint',
      message: 'PKI service startup failed',
      reason_code: 'startup_failed',
      metadata: {
        error
      }
    })
    process.exit(1)
  })
}
