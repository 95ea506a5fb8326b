import { Module } from '@nestjs/common';
import { StagingAreaService } from './staging-area.service';

@Module({
  providers: [StagingAreaService],
  exports: [StagingAreaService],
})
export class StagingModule {}
