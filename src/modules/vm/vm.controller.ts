import { Controller, Delete, HttpCode, HttpException, HttpStatus, Param } from '@nestjs/common';
import { ApiOperation, ApiParam, ApiResponse, ApiTags } from '@nestjs/swagger';
import { DeleteVmResult, DeleteVmResultDto } from '../../infra/contracts/provision.dto';
import { VmDeletionService } from './vm-deletion.service';

/**
 * VM lifecycle API. `DELETE /vm` without a name is routed here too so that it
 * answers 400 rather than 404.
 */
@ApiTags('vm')
@Controller()
export class VmController {
  constructor(private readonly deletion: VmDeletionService) {}

  @Delete(['vm', 'vm/:name'])
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Stop and remove a VM' })
  @ApiParam({ name: 'name', description: 'VM name', example: 'm1' })
  @ApiResponse({ status: 200, description: 'VM deleted', type: DeleteVmResultDto })
  @ApiResponse({ status: 400, description: 'VM name missing', type: DeleteVmResultDto })
  @ApiResponse({ status: 500, description: 'ignite vm stop or rm failed', type: DeleteVmResultDto })
  async deleteVm(@Param('name') name?: string): Promise<DeleteVmResult> {
    const outcome = await this.deletion.delete(name);
    if (!outcome.ok) {
      throw new HttpException(outcome.result, outcome.status);
    }
    return outcome.result;
  }
}
