export { tokenize, normalizeHabitName } from './normalize.js';
export type { NormalizeOptions } from './normalize.js';
export { editDistance, similarity, similarityUpperBound } from './edit-distance.js';
