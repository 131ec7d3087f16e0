export const PKI_SERVICE_CONFIG = Symbol('PKI_SERVICE_CONFIG')
export const PKI_SERVICE_REGISTRAR = Symbol('PKI_SERVICE_REGISTRAR')
export const PKI_SERVICE_ARCHITECTURE_STORE = Symbol('PKI_SERVICE_ARCHITECTURE_STORE')
export const PKI_SERVICE_LOGGER = Symbol('PKI_SERVICE_LOGGER')
export const PKI_SERVICE_NOW = Symbol('PKI_SERVICE_NOW')
export const PKI_SERVICE_REQUEST_HANDLER = Symbol('PKI_SERVICE_REQUEST_HANDLER')
