// Result shaping
export {
  selectResult,
  stripLinkage,
  shapeFailure,
  unwrapResult,
  type TransactSuccess,
  type TransactFailure,
  type TransactResult,
  type Returned,
} from './shape.js';
