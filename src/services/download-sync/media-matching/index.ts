/**
 * Media Matching Module Index
 */

export * from './candidate-selector.js'
export * from './media-matcher.js'
