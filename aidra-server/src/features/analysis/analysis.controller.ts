import {
  Body,
  Controller,
  HttpCode,
  HttpException,
  HttpStatus,
  Post,
  Req,
  Res,
  UploadedFile,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import type { Request, Response } from 'express';

import { AnalysisCancelledError } from '../../common/errors/analysis-errors';
import { STATUS_BY_KIND } from '../../common/errors/envelope-exception.filter';
import { getRequestId, getSessionId } from '../../common/http/request-id';
import { ok } from '../../common/http/response.envelope';

import { AnalysisOrchestrator } from './analysis.orchestrator';
import { AnalyzeImageDto } from './dto/analyze-image.dto';

@Controller('api/v1/analyze')
export class AnalysisController {
  constructor(private readonly orchestrator: AnalysisOrchestrator) {}

  @Post()
  @HttpCode(HttpStatus.OK)
  @UseInterceptors(FileInterceptor('image'))
  async analyze(
    @UploadedFile() file: Express.Multer.File | undefined,
    @Body() body: AnalyzeImageDto,
    @Req() req: Request,
    @Res({ passthrough: true }) res: Response,
  ) {
    const requestId = getRequestId(req);
    const sessionId = getSessionId(req);

    // A closed connection before the response is written means the client left.
    const cancel = new AbortController();
    const onClose = () => {
      if (!res.writableEnded) {
        cancel.abort(new AnalysisCancelledError('Client disconnected'));
      }
    };
    res.on('close', onClose);

    try {
      const outcome = await this.orchestrator.analyze({
        image: {
          data: file?.buffer ?? Buffer.alloc(0),
          mimeType: file?.mimetype ?? '',
        },
        countryCode: body.country_code,
        sessionId,
        requestId,
        signal: cancel.signal,
      });

      if (!outcome.ok) {
        const { kind, message, stage } = outcome.failure;
        throw new HttpException(
          { code: kind, message, stage },
          STATUS_BY_KIND[kind],
        );
      }

      return ok(
        { session_id: outcome.sessionId, ...outcome.report },
        requestId,
      );
    } finally {
      res.off('close', onClose);
    }
  }
}
