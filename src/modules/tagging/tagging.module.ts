import { Global, Module } from '@nestjs/common';
import { TagConfigService } from './tag-config.service';
import { TagService } from './tag.service';

@Global()
@Module({
  providers: [TagConfigService, TagService],
  exports: [TagConfigService, TagService],
})
export class TaggingModule {}
