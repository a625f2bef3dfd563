/**
 * Report Builder Port
 *
 * Assembles the update report from resolved graphs and fetched artifacts.
 */

import type { Logger, UpdateParams, UpdateReport } from '../../types/index.js';

export interface ReportBuilder {
  build(params: UpdateParams, logger: Logger): UpdateReport;
}
