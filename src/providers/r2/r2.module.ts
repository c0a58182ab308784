import { Module, Global } from '@nestjs/common';
import { R2Service } from './r2.service';
import { ObjectStorage } from './object-storage';

@Global()
@Module({
  providers: [R2Service, { provide: ObjectStorage, useExisting: R2Service }],
  exports: [R2Service, ObjectStorage],
})
export class R2Module {}
