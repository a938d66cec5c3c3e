export { renderSummary, writeSummary } from './summary-reporter';
