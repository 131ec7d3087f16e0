import {AsyncLocalStorage} from 'node:async_hooks';

import {z} from 'zod';

const LabelSchema = z.string().min(1).max(256);

export const RequestLogContextSchema = z
  .object({
    correlation_id: z.string().min(1).max(128),
    request_id: z.string().min(1).max(128),
    method: z.string().min(1).optional(),
    route: z.string().min(1).optional(),
    arch_label: LabelSchema.optional(),
    cert_label: LabelSchema.optional()
  })
  .strict();

export type RequestLogContext = z.infer<typeof RequestLogContextSchema>;

// What becomes known while a request is routed and served.
const RequestScopeSchema = RequestLogContextSchema.pick({route: true, arch_label: true, cert_label: true}).partial();

export type RequestScope = z.infer<typeof RequestScopeSchema>;

const requestContexts = new AsyncLocalStorage<RequestLogContext>();

export const runWithRequestContext = <T>(context: RequestLogContext, operation: () => T): T =>
  requestContexts.run(RequestLogContextSchema.parse(context), operation);

export const currentRequestContext = (): RequestLogContext | undefined => requestContexts.getStore();

/**
 * Narrows the current request to a route, an architecture or one of its
 * certificates, so every later event carries those labels. Returns false
 * outside a request.
 */
export const scopeRequest = (scope: RequestScope): boolean => {
  const context = requestContexts.getStore();
  if (!context) {
    return false;
  }

  Object.assign(context, RequestScopeSchema.parse(scope));
  return true;
};
