export { createFanoutExecutor, isNotFound, type FanoutExecutor, type FanoutExecutorDeps } from './executor';
export {
  commandKind,
  formatTimestamp,
  isLogCommand,
  shapeLogLines,
  shapeOutput,
  shapeTable,
  splitFields,
} from './output-shaping';
