export type { Condition, Comparable } from './conditions'
export {
  defineCondition,
  describeCondition,
  isPositive,
  isNegative,
  greaterThan,
  lesserThan,
  within,
  allowed,
} from './conditions'
