import {scopeRequest} from '@adhoc-pki/logging'
import type {BuiltArchitecture} from '@adhoc-pki/pki'

import {notFound} from '../../errors'
import {decodePathParam, sendArchitectureBundle, sendCertificate} from '../../http'
import type {RouteHandlerContext, RouteLogicHandler} from './types'

const MAX_ARCH_LABEL_LENGTH = 256

const resolveArchitecture = async ({runtime}: RouteHandlerContext, encodedArchLabel: string) => {
  const archLabel = decodePathParam(encodedArchLabel)
  if (archLabel.length > MAX_ARCH_LABEL_LENGTH) {
    throw notFound('architecture_not_found', 'Architecture is not known')
  }

  scopeRequest({arch_label: archLabel})
  return runtime.architectureStore.resolve(archLabel)
}

const requireCertificate = (architecture: BuiltArchitecture, certLabel: string) => {
  const issued = architecture.getCertificate(certLabel)
  if (!issued) {
    throw notFound('certificate_not_found', `Architecture ${architecture.label} has no certificate ${certLabel}`)
  }

  scopeRequest({cert_label: certLabel})
  return issued
}

const requireRepository = (architecture: BuiltArchitecture, encodedRepoLabel: string) => {
  const repoLabel = decodePathParam(encodedRepoLabel)
  const repository = architecture.certRepositories.get(repoLabel)
  if (!repository) {
    throw notFound('cert_repo_not_found', `Architecture ${architecture.label} has no certificate repository ${repoLabel}`)
  }

  return repository
}

export const handleArchitectureRoute: RouteLogicHandler<{archLabel: string}> = async (context, {archLabel}) => {
  sendArchitectureBundle(context, await resolveArchitecture(context, archLabel))
}

export const handleCertificateRoute: RouteLogicHandler<{archLabel: string; certLabel: string}> = async (
  context,
  {archLabel, certLabel}
) => {
  const architecture = await resolveArchitecture(context, archLabel)
  sendCertificate(context, requireCertificate(architecture, decodePathParam(certLabel)))
}

export const handleCertRepoCaRoute: RouteLogicHandler<{archLabel: string; repoLabel: string}> = async (
  context,
  {archLabel, repoLabel}
) => {
  const architecture = await resolveArchitecture(context, archLabel)
  const repository = requireRepository(architecture, repoLabel)
  sendCertificate(context, requireCertificate(architecture, repository.caCertLabel))
}

// A repository publishes the certificates its CA entity issued, unless told not to.
export const handleCertRepoIssuedRoute: RouteLogicHandler<{archLabel: string; repoLabel: string; certLabel: string}> = async (
  context,
  {archLabel, repoLabel, certLabel}
) => {
  const architecture = await resolveArchitecture(context, archLabel)
  const repository = requireRepository(architecture, repoLabel)
  const decodedCertLabel = decodePathParam(certLabel)
  const issued = architecture.getCertificate(decodedCertLabel)
  if (!repository.publishIssuedCerts || !issued || issued.issuer !== repository.forIssuer) {
    throw notFound(
      'certificate_not_found',
      `Certificate repository ${repository.label} does not publish certificate ${decodedCertLabel}`
    )
  }

  scopeRequest({cert_label: decodedCertLabel})
  sendCertificate(context, issued)
}
