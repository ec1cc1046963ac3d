import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus, Logger } from '@nestjs/common';
import type { Response } from 'express';

import { DocumentStoreError, DocumentStoreUnavailableError } from './document-store';

@Catch(DocumentStoreError)
export class DocumentStoreExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(DocumentStoreExceptionFilter.name);

  catch(exception: DocumentStoreError, host: ArgumentsHost) {
    const response = host.switchToHttp().getResponse<Response>();
    const unavailable = exception instanceof DocumentStoreUnavailableError;
    const statusCode = unavailable ? HttpStatus.SERVICE_UNAVAILABLE : HttpStatus.INTERNAL_SERVER_ERROR;

    this.logger.error(exception.message);

    response.status(statusCode).json({
      statusCode,
      message: unavailable ? 'Database unavailable' : 'Database operation failed',
    });
  }
}
