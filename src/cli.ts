import { INestApplicationContext, Logger } from '@nestjs/common';
import { isSortingError } from './sorting/errors/sorting-errors';
import { SortingReportService } from './sorting/report/sorting-report.service';

const logger = new Logger('PackageSorter');

/**
 * Prints the report lines for `argv` and returns the process exit code.
 * A `SortingError` is logged and yields 1; anything else is rethrown.
 */
export function runCli(
  app: Pick<INestApplicationContext, 'get'>,
  argv: string[],
  print: (line: string) => void = (line) => console.log(line),
): number {
  try {
    const report = app.get(SortingReportService);
    for (const line of report.run(argv)) {
      print(line);
    }
    return 0;
  } catch (err: unknown) {
    if (!isSortingError(err)) {
      throw err;
    }
    logger.error(`${err.code}: ${err.message}`, JSON.stringify(err.details));
    return 1;
  }
}
