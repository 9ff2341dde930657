import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { DropboxStorageService } from './dropbox-storage.service';

@Module({
  imports: [ConfigModule],
  providers: [DropboxStorageService],
  exports: [DropboxStorageService],
})
export class StorageModule {}
