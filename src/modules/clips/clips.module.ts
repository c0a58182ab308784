import { Module } from '@nestjs/common';
import { ClipSlicerService } from './clip-slicer.service';

@Module({
  providers: [ClipSlicerService],
  exports: [ClipSlicerService],
})
export class ClipsModule {}
