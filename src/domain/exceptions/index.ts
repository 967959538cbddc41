/**
 * specwise - Exception Module
 *
 * Construction and query errors, plus the guards that raise them.
 */

export {
  SpecificationException,
  // Construction errors
  ArgumentException,
  ArgumentNullException,
  ArgumentOutOfRangeException,
  // Query errors
  InvalidOperationException,
  NoMatchException,
  MultipleMatchesException,
} from './exceptions';

export { Guard } from './guards';
