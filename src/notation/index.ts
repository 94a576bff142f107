export { parseNotation } from './parseNotation';
export { formatNotation } from './formatNotation';
