import { Module } from '@nestjs/common';
import { StructureEngine } from './structure-engine';

@Module({
  providers: [StructureEngine],
  exports: [StructureEngine],
})
export class StructureModule {}
