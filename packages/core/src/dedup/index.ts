export { computeImportId, findImportIdCollisions } from './import-id.js';
