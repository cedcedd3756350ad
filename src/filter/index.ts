/**
 * AdFeed — Filter Module
 */

export { accepts, orderedLevels, isLevelKey } from './engine';
