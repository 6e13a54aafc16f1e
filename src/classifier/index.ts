export { classifyCatalog, DEFAULT_CLASSIFIER_OPTIONS } from './classifier';
export { describeType, roomNameOf, categoryNameOf } from './helpers';
export type { Classification, ClassificationTotals, ClassifierOptions } from './types';
