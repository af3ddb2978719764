/**
 * Cache Errors
 */

/**
 * Thrown when a cache path is empty where a key is required, or when a path
 * tries to descend through a stored value as if it were a directory.
 */
export class InvalidPathError extends Error {
  constructor(
    message: string,
    readonly path: string
  ) {
    super(message)
    this.name = 'InvalidPathError'
  }
}

/**
 * Thrown when a cache cannot establish its backing directory.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigurationError'
  }
}
