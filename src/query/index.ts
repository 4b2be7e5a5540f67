export { matchedBy, select, selectAll, toSelectorGroup } from './query.js';
export type { SelectorLike } from './query.js';
