// Public API barrel for paged-data-context/specification subpath.

export {
  Specification,
  PredicateSpecification,
  AndSpecification,
  OrSpecification,
  NotSpecification,
  spec,
} from './specification.js';
