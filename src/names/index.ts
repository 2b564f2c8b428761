export {
  createName,
  isIdentifier,
  isModuleName,
  nameEquals,
  parseModuleName,
  parseName,
  renderName,
} from './name.js';
export type { Name } from './name.js';
