import { Module } from '@nestjs/common';
import { ContactsController } from './contacts.controller';
import { ContactsService } from './contacts.service';
import { ContactsRepo } from './contacts.repo';

@Module({
  controllers: [ContactsController],
  providers: [ContactsService, ContactsRepo],
  exports: [ContactsService],
})
export class ContactsModule {}
