import { Global, Module } from '@nestjs/common';
import { TablePreferencesService } from './table-preferences.service';

@Global()
@Module({
  providers: [TablePreferencesService],
  exports: [TablePreferencesService],
})
export class TableModule {}
