import { Module } from '@nestjs/common';
import { SortingModule } from './sorting/sorting.module';

@Module({
  imports: [SortingModule],
})
export class AppModule {}
