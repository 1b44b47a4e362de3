export { normalizeMessage, countWords } from './normalize.js';
export { escapeRegExp, wholeWordPattern } from './regex.js';
export { roundTo } from './round.js';
export { generateTxnId, resolveTxnIdCollision } from './txn-id.js';
