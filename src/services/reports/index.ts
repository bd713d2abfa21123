export { TrackReportService, ACCENTED_VOWELS } from './trackReportService.js';
export { SalesReportService } from './salesReportService.js';
