import { Module } from '@nestjs/common';
import { KeyPointExtractorService } from './key-point-extractor.service';

@Module({
  providers: [KeyPointExtractorService],
  exports: [KeyPointExtractorService],
})
export class KeyPointsModule {}
