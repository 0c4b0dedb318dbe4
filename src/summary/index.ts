/**
 * Summary Module Exports
 *
 * @module summary
 */

export { renderSummary, toSummaryItem, heartRateRange } from './renderer.js';
export {
  formatHeader,
  formatActivity,
  formatWorkout,
  formatNutrition,
  formatSleep,
  formatHeartRateRange,
  formatUnknownUser,
} from './templates.js';
