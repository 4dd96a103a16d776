import { Controller, Get, Query, Req } from '@nestjs/common';
import type { Request } from 'express';

import { ok } from '../../common/http/response.envelope';
import { getRequestId } from '../../common/http/request-id';
import { normalizeDisasterType } from '../../shared/lib/disaster-type';

import { GetContactsDto } from './dto/get-contacts.dto';
import { ContactsService } from './contacts.service';

@Controller('api/v1/contacts')
export class ContactsController {
  constructor(private readonly service: ContactsService) {}

  @Get()
  lookup(@Query() query: GetContactsDto, @Req() req: Request) {
    const requestId = getRequestId(req);
    const disasterType = normalizeDisasterType(query.disaster_type ?? 'other');
    const data = this.service.lookup(disasterType, query.country_code);
    return ok(data, requestId);
  }

  @Get('countries')
  countries(@Req() req: Request) {
    const requestId = getRequestId(req);
    return ok({ countries: this.service.supportedCountries() }, requestId);
  }
}
