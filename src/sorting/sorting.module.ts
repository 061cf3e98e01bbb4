import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { sortingEnvSchema } from './config/sorting.config';
import { SortingReportService } from './report/sorting-report.service';
import { PackageSorterService } from './services/package-sorter.service';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validationSchema: sortingEnvSchema,
      envFilePath: '.env',
    }),
  ],
  providers: [PackageSorterService, SortingReportService],
  exports: [PackageSorterService, SortingReportService],
})
export class SortingModule {}
