import { Controller, Get } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';

export const SERVICE_NAME = 'ignite-provision-api';

/**
 * Root application controller.
 */
@ApiTags('health')
@Controller()
export class AppController {
  /**
   * Health check endpoint for load balancers and monitoring.
   */
  @Get('health')
  @ApiOperation({
    summary: 'Health check',
    description: 'Returns ok if the service is running.',
  })
  @ApiResponse({
    status: 200,
    description: 'Service is healthy',
    schema: {
      type: 'object',
      properties: {
        status: { type: 'string', example: 'ok' },
        service: { type: 'string', example: SERVICE_NAME },
      },
    },
  })
  getHealth() {
    return { status: 'ok', service: SERVICE_NAME };
  }
}
