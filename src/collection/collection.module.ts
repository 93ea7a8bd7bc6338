import { Module } from '@nestjs/common';
import { CollectionRepository } from './collection.repository';

@Module({
  providers: [CollectionRepository],
  exports: [CollectionRepository],
})
export class CollectionModule {}
