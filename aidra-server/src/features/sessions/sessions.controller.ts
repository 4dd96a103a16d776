import { Controller, Get, NotFoundException, Param, Req } from '@nestjs/common';
import type { Request } from 'express';

import { ok } from '../../common/http/response.envelope';
import { getRequestId } from '../../common/http/request-id';

import { GetSessionParamsDto } from './dto/get-session.dto';
import { SessionsService } from './sessions.service';

@Controller('api/v1/sessions')
export class SessionsController {
  constructor(private readonly service: SessionsService) {}

  @Get(':session_id')
  getSession(@Param() params: GetSessionParamsDto, @Req() req: Request) {
    const requestId = getRequestId(req);
    const session = this.service.getSession(params.session_id);
    if (!session)
      throw new NotFoundException(`Session not found: ${params.session_id}`);
    return ok(session, requestId);
  }
}
