export type RouteMatch =
  | {kind: 'health'}
  | {kind: 'registration'}
  | {kind: 'architecture'; archLabel: string}
  | {kind: 'certificate'; archLabel: string; certLabel: string}
  | {kind: 'certRepoCa'; archLabel: string; repoLabel: string}
  | {kind: 'certRepoIssued'; archLabel: string; repoLabel: string; certLabel: string}
  | {kind: 'methodNotAllowed'; allowedMethods: string[]}
  | {kind: 'notFound'}

const architecturePathPattern = /^\/([^/]+)\/?$/u
const certificatePathPattern = /^\/([^/]+)\/certs\/([^/]+)\.crt$/u
// below the cert_repo endpoint advertised in the bundle: {arch}/certs/{repo}
const certRepoCaPathPattern = /^\/([^/]+)\/certs\/([^/]+)\/ca\.crt$/u
const certRepoIssuedPathPattern = /^\/([^/]+)\/certs\/([^/]+)\/issued\/([^/]+)\.crt$/u

const trimTrailingSlash = (pathname: string) =>
  pathname.length > 1 && pathname.endsWith('/') ? pathname.slice(0, -1) : pathname

const onlyGet = (method: string, match: RouteMatch): RouteMatch =>
  method === 'GET' || method === 'HEAD' ? match : {kind: 'methodNotAllowed', allowedMethods: ['GET', 'HEAD']}

/**
 * Maps a request onto the registration endpoint or the serving surface.
 * The registration path and /healthz win over architecture labels of the
 * same name. Path parameters are returned still percent-encoded.
 */
export const matchRoute = ({
  method,
  pathname,
  registrationPath
}: {
  method: string
  pathname: string
  registrationPath: string
}): RouteMatch => {
  if (trimTrailingSlash(pathname) === trimTrailingSlash(registrationPath)) {
    return method === 'POST' ? {kind: 'registration'} : {kind: 'methodNotAllowed', allowedMethods: ['POST']}
  }

  if (pathname === '/healthz') {
    return onlyGet(method, {kind: 'health'})
  }

  const repoCaMatch = certRepoCaPathPattern.exec(pathname)
  if (repoCaMatch?.[1] && repoCaMatch[2]) {
    return onlyGet(method, {kind: 'certRepoCa', archLabel: repoCaMatch[1], repoLabel: repoCaMatch[2]})
  }

  const repoIssuedMatch = certRepoIssuedPathPattern.exec(pathname)
  if (repoIssuedMatch?.[1] && repoIssuedMatch[2] && repoIssuedMatch[3]) {
    return onlyGet(method, {
      kind: 'certRepoIssued',
      archLabel: repoIssuedMatch[1],
      repoLabel: repoIssuedMatch[2],
      certLabel: repoIssuedMatch[3]
    })
  }

  const certificateMatch = certificatePathPattern.exec(pathname)
  if (certificateMatch?.[1] && certificateMatch[2]) {
    return onlyGet(method, {kind: 'certificate', archLabel: certificateMatch[1], certLabel: certificateMatch[2]})
  }

  const architectureMatch = architecturePathPattern.exec(pathname)
  if (architectureMatch?.[1]) {
    return onlyGet(method, {kind: 'architecture', archLabel: architectureMatch[1]})
  }

  return {kind: 'notFound'}
}
