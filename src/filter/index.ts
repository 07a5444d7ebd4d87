/**
 * Filter Module
 */

export { filterByMonth } from './month-filter.js';
