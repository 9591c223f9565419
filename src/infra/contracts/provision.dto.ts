import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsBoolean, IsInt, IsOptional, IsString } from 'class-validator';

/** Role of a provisioned node. The route decides which one a request is handled as. */
export type NodeType = 'master' | 'worker';

/**
 * Request body for POST /master/provision and POST /worker/provision.
 * Every field is optional at the HTTP layer; required-ness is checked by the workflow
 * so that missing names come back in the ProvisionResult shape.
 */
export class ProvisionRequestDto {
  @ApiPropertyOptional({ example: 'm1' })
  @IsOptional()
  @IsString()
  nodeName?: string;

  @ApiPropertyOptional({ example: 'u1' })
  @IsOptional()
  @IsString()
  nodeUid?: string;

  @ApiPropertyOptional({
    description: 'Stored as-is in the node config and ledger. Must be "worker" on the worker route.',
    example: 'worker',
  })
  @IsOptional()
  @IsString()
  nodeType?: string;

  @ApiPropertyOptional({ description: 'Shared join token', example: 'test-token' })
  @IsOptional()
  @IsString()
  token?: string;

  @ApiPropertyOptional({ description: 'IP of the master a worker joins', example: '10.0.0.5' })
  @IsOptional()
  @IsString()
  masterIP?: string;

  @ApiPropertyOptional({ description: 'vCPU count; values <= 0 fall back to 2', example: 2 })
  @IsOptional()
  @IsInt()
  cpus?: number;

  @ApiPropertyOptional({ description: 'Defaults to 3GB', example: '3GB' })
  @IsOptional()
  @IsString()
  diskSize?: string;

  @ApiPropertyOptional({ description: 'Defaults to 1GB', example: '1GB' })
  @IsOptional()
  @IsString()
  memory?: string;

  @ApiPropertyOptional({ description: 'OCI image reference for the VM root filesystem' })
  @IsOptional()
  @IsString()
  imageOci?: string;

  @ApiPropertyOptional({ example: false })
  @IsOptional()
  @IsBoolean()
  enableSsh?: boolean;
}

/** Parsed provision request with unset fields normalized to their zero values. */
export interface ProvisionRequest {
  readonly nodeName: string;
  readonly nodeUid: string;
  readonly nodeType: string;
  readonly token: string;
  readonly masterIP: string;
  readonly cpus: number;
  readonly diskSize: string;
  readonly memory: string;
  readonly imageOci: string;
  readonly enableSsh: boolean;
}

export function toProvisionRequest(dto: ProvisionRequestDto): ProvisionRequest {
  return {
    nodeName: dto.nodeName ?? '',
    nodeUid: dto.nodeUid ?? '',
    nodeType: dto.nodeType ?? '',
    token: dto.token ?? '',
    masterIP: dto.masterIP ?? '',
    cpus: dto.cpus ?? 0,
    diskSize: dto.diskSize ?? '',
    memory: dto.memory ?? '',
    imageOci: dto.imageOci ?? '',
    enableSsh: dto.enableSsh ?? false,
  };
}

/** Response for both provision routes, success and failure. */
export class ProvisionResultDto {
  @ApiProperty({ example: true })
  success!: boolean;

  @ApiProperty({ description: 'Empty on failure', example: "VM 'm1' successfully provisioned" })
  message!: string;

  @ApiPropertyOptional({ example: 'u1' })
  nodeId?: string;

  @ApiPropertyOptional({ description: 'IP discovered for the new VM', example: '10.0.0.5' })
  masterIP?: string;

  @ApiPropertyOptional({ example: 'NodeName and NodeUID are required fields' })
  error?: string;
}

/** Provision result type used in the service layer. */
export interface ProvisionResult {
  success: boolean;
  message: string;
  nodeId?: string;
  masterIP?: string;
  error?: string;
}

/** Response for DELETE /vm/:name. */
export class DeleteVmResultDto {
  @ApiProperty({ example: true })
  success!: boolean;

  @ApiPropertyOptional({ example: "VM 'm1' successfully deleted" })
  message?: string;

  @ApiPropertyOptional({ example: 'Failed to stop VM: exit status 1' })
  error?: string;
}

export interface DeleteVmResult {
  success: boolean;
  message?: string;
  error?: string;
}
