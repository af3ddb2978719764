/**
 * Types Index
 *
 * Re-exports all types from domain-specific files.
 */

export * from './card'
export * from './card-set'
export * from './collection'
export * from './fields'
