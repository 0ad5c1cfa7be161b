export * from './hash.js'
export * from './diff-summary.js'
export * from './change-tracker.js'
