import { Body, Controller, HttpCode, HttpException, HttpStatus, Post } from '@nestjs/common';
import { ApiBody, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import {
  NodeType,
  ProvisionRequestDto,
  ProvisionResult,
  ProvisionResultDto,
  toProvisionRequest,
} from '../../infra/contracts/provision.dto';
import { ProvisionWorkflowService } from './provision-workflow.service';

/**
 * Provisioning API. Both routes run the same workflow; the worker route also
 * checks masterIP and token against the ledger.
 */
@ApiTags('provisioning')
@Controller()
export class ProvisioningController {
  constructor(private readonly workflow: ProvisionWorkflowService) {}

  @Post('master/provision')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Provision a master node' })
  @ApiBody({ type: ProvisionRequestDto })
  @ApiResponse({ status: 200, description: 'VM created and recorded', type: ProvisionResultDto })
  @ApiResponse({ status: 400, description: 'Missing nodeName or nodeUid', type: ProvisionResultDto })
  @ApiResponse({ status: 500, description: 'Staging, ignite or ledger failure', type: ProvisionResultDto })
  async provisionMaster(@Body() dto: ProvisionRequestDto): Promise<ProvisionResult> {
    return this.provision('master', dto);
  }

  @Post('worker/provision')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Provision a worker node',
    description: 'masterIP and token must match a ledger row written by an earlier provision.',
  })
  @ApiBody({ type: ProvisionRequestDto })
  @ApiResponse({ status: 200, description: 'VM created and recorded', type: ProvisionResultDto })
  @ApiResponse({ status: 400, description: 'Validation or token check failed', type: ProvisionResultDto })
  @ApiResponse({ status: 500, description: 'Staging, ignite or ledger failure', type: ProvisionResultDto })
  async provisionWorker(@Body() dto: ProvisionRequestDto): Promise<ProvisionResult> {
    return this.provision('worker', dto);
  }

  private async provision(nodeType: NodeType, dto: ProvisionRequestDto): Promise<ProvisionResult> {
    const outcome = await this.workflow.provision(nodeType, toProvisionRequest(dto));
    if (!outcome.ok) {
      throw new HttpException(outcome.result, outcome.status);
    }
    return outcome.result;
  }
}
