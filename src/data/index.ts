/**
 * Sample data exports.
 */

export { loadSampleData, parseSampleData, SampleDataError } from './SampleData.js';
