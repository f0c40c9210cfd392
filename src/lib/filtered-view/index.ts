/**
 * Filtered View Module
 *
 * Lazy, restartable filter/transform adaptor over iterables.
 */

export { FilteredView, FilteredCursor, filtered } from './filtered-view';
export type { Predicate, Transform } from './filtered-view';
