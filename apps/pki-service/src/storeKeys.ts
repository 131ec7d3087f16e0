/**
 * Shared-store key layout. Every worker must derive the same keys, so the
 * prefix comes from configuration and nothing else is folded in.
 */
export type StoreKeyLayout = {
  archConfigKey: (archLabel: string) => string
  certificateKey: (archLabel: string, certLabel: string) => string
}

export const createStoreKeyLayout = ({prefix}: {prefix: string}): StoreKeyLayout => ({
  archConfigKey: archLabel => `${prefix}_${archLabel}_config`,
  certificateKey: (archLabel, certLabel) => `${prefix}_${archLabel}_cert_${certLabel}`
})
