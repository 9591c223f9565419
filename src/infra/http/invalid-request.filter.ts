import { ArgumentsHost, BadRequestException, Catch, ExceptionFilter } from '@nestjs/common';
import type { Response } from 'express';
import type { ProvisionResult } from '../contracts/provision.dto';

/**
 * Gives every 400 the ProvisionResult shape. Bodies the validation pipe already
 * built pass through; anything else (a body the JSON parser rejected) becomes
 * `Invalid request format: <parser message>`.
 */
@Catch(BadRequestException)
export class InvalidRequestFilter implements ExceptionFilter {
  catch(exception: BadRequestException, host: ArgumentsHost): void {
    const res = host.switchToHttp().getResponse<Response>();
    const body = exception.getResponse();
    if (typeof body === 'object' && 'success' in body) {
      res.status(exception.getStatus()).json(body);
      return;
    }
    const result: ProvisionResult = {
      success: false,
      message: '',
      error: `Invalid request format: ${exception.message}`,
    };
    res.status(exception.getStatus()).json(result);
  }
}
