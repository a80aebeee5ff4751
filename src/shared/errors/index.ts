/**
 * Shared Errors Module
 *
 * @module errors
 */

export {
  // Error codes
  GameErrorCode,
  // Base class
  GameError,
  type GameErrorJSON,
  // Specific errors
  InputUnreadableError,
  // Utilities
  isGameError,
  wrapError,
} from './GameDomainErrors';
