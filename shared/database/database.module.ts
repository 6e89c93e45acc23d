/**
 * Database Module for the Email Inbox API
 */

import { Global, Module } from '@nestjs/common';
import { ConnectionProvider, DATA_SOURCE_FACTORY, createDataSource } from './connection.provider';

@Global()
@Module({
  providers: [
    { provide: DATA_SOURCE_FACTORY, useValue: createDataSource },
    ConnectionProvider,
  ],
  exports: [ConnectionProvider],
})
export class DatabaseModule {}
