export * from './engine/engine-errors'
export * from './engine/engine-settings'
export * from './engine/equity-models'
export * from './engine/grant-ledger'
export * from './engine/ledger-events'
export * from './engine/portfolio-summary'
export * from './engine/price-history'
export * from './engine/tax-preferences'
export * from './engine/validation'
export * from './engine/vest-valuation'
export * from './engine/vesting-policy'
export * from './engine/vesting-schedule'
