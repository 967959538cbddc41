export { evaluateWithDetails, describeSpecification } from './SpecificationEvaluator';

export type {
  SpecificationEvaluationOptions,
  SpecificationEvaluationResult,
  FailedSpecification,
} from './SpecificationEvaluator';
