/**
 * Errors Module
 */

export {
  TransitModelError,
  ReferentialIntegrityError,
  DuplicateIdentifierError,
  HandleScopeError,
  HandleRangeError,
  ConfigError,
} from './errors'
