import { Module } from '@nestjs/common';
import { EmailInboxController } from './email-inbox.controller';
import { EmailInboxService } from './email-inbox.service';

@Module({
  controllers: [EmailInboxController],
  providers: [EmailInboxService],
})
export class EmailInboxModule {}
