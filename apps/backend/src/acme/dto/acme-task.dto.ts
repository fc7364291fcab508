import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import {
  ArrayNotEmpty,
  IsArray,
  IsBoolean,
  IsIn,
  IsInt,
  IsOptional,
  IsString,
  IsUrl,
  MaxLength,
  Min,
  Max,
  ValidateIf,
} from 'class-validator';
import { Transform, Type } from 'class-transformer';
import { ACME_AUTH_TYPES, AcmeAuthType } from '../acme.constants';

const toBoolean = ({ value }: { value: unknown }) => value === 'true' || value === true;

/**
 * DTO for creating an issuance task
 */
export class CreateAcmeTaskDto {
  @ApiPropertyOptional({ description: 'Admin who created the task', default: 0 })
  @IsOptional()
  @IsInt()
  @Min(0)
  adminId?: number;

  @ApiPropertyOptional({ description: 'Owning user, 0 for admin-owned tasks', default: 0 })
  @IsOptional()
  @IsInt()
  @Min(0)
  userId?: number;

  @ApiProperty({ description: 'Validation method', enum: [...ACME_AUTH_TYPES] })
  @IsIn(ACME_AUTH_TYPES)
  authType!: AcmeAuthType;

  @ApiProperty({ description: 'ACME account the task issues under', example: 1 })
  @IsInt()
  @Min(1)
  acmeUserId!: number;

  @ApiPropertyOptional({ description: 'DNS provider (required for dns tasks)' })
  @ValidateIf((dto: CreateAcmeTaskDto) => dto.authType === 'dns')
  @IsInt()
  @Min(1)
  dnsProviderId?: number;

  @ApiPropertyOptional({ description: 'DNS zone the challenge records go into', example: 'example.com' })
  @IsOptional()
  @IsString()
  @MaxLength(255)
  dnsDomain?: string;

  @ApiProperty({ description: 'Domains covered by the certificate', type: [String] })
  @IsArray()
  @ArrayNotEmpty()
  @IsString({ each: true })
  domains!: string[];

  @ApiPropertyOptional({ description: 'Renew automatically before expiry', default: true })
  @IsOptional()
  @IsBoolean()
  @Transform(toBoolean)
  autoRenew?: boolean;

  @ApiPropertyOptional({ description: 'Webhook notified with every HTTP-01 token' })
  @IsOptional()
  @IsUrl({ require_tld: false })
  authUrl?: string;

  @ApiPropertyOptional({ description: 'Let the scheduler issue the certificate', default: false })
  @IsOptional()
  @IsBoolean()
  @Transform(toBoolean)
  async?: boolean;
}

export class UpdateAcmeTaskDto {
  @ApiProperty({ description: 'ACME account the task issues under' })
  @IsInt()
  @Min(1)
  acmeUserId!: number;

  @ApiPropertyOptional({ description: 'DNS provider (dns tasks only)' })
  @IsOptional()
  @IsInt()
  @Min(1)
  dnsProviderId?: number;

  @ApiPropertyOptional({ description: 'DNS zone the challenge records go into' })
  @IsOptional()
  @IsString()
  @MaxLength(255)
  dnsDomain?: string;

  @ApiProperty({ description: 'Domains covered by the certificate', type: [String] })
  @IsArray()
  @ArrayNotEmpty()
  @IsString({ each: true })
  domains!: string[];

  @ApiProperty({ description: 'Renew automatically before expiry' })
  @IsBoolean()
  @Transform(toBoolean)
  autoRenew!: boolean;

  @ApiPropertyOptional({ description: 'Webhook notified with every HTTP-01 token' })
  @IsOptional()
  @IsUrl({ require_tld: false })
  authUrl?: string;
}

/**
 * Query params for listing tasks
 */
export class ListAcmeTasksQueryDto {
  @ApiPropertyOptional({ description: 'Restrict to one user' })
  @IsOptional()
  @IsInt()
  @Min(1)
  @Type(() => Number)
  userId?: number;

  @ApiPropertyOptional({ description: 'List user-owned instead of admin-owned tasks' })
  @IsOptional()
  @IsBoolean()
  @Transform(toBoolean)
  userOnly?: boolean;

  @ApiPropertyOptional({ description: 'Only tasks whose certificate is valid now' })
  @IsOptional()
  @IsBoolean()
  @Transform(toBoolean)
  isAvailable?: boolean;

  @ApiPropertyOptional({ description: 'Only tasks whose certificate has expired' })
  @IsOptional()
  @IsBoolean()
  @Transform(toBoolean)
  isExpired?: boolean;

  @ApiPropertyOptional({ description: 'Only tasks whose certificate expires within N days' })
  @IsOptional()
  @IsInt()
  @Min(1)
  @Type(() => Number)
  expiringDays?: number;

  @ApiPropertyOptional({ description: 'Substring of a covered domain' })
  @IsOptional()
  @IsString()
  @MaxLength(255)
  keyword?: string;

  @ApiPropertyOptional({ description: 'Rows to skip', default: 0 })
  @IsOptional()
  @IsInt()
  @Min(0)
  @Type(() => Number)
  offset?: number = 0;

  @ApiPropertyOptional({ description: 'Page size', default: 20 })
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(100)
  @Type(() => Number)
  size?: number = 20;
}

export class ListIssuableTasksQueryDto {
  @ApiPropertyOptional({ description: 'Minimum task age in hours', default: 1 })
  @IsOptional()
  @IsInt()
  @Min(0)
  @Type(() => Number)
  staleHours?: number;

  @ApiPropertyOptional({ description: 'Maximum tasks returned', default: 10 })
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(1000)
  @Type(() => Number)
  limit?: number;

  @ApiPropertyOptional({ description: 'Comma separated task ids to leave out', example: '3,7' })
  @IsOptional()
  @Transform(({ value }: { value: unknown }) =>
    typeof value === 'string'
      ? value
          .split(',')
          .map((id) => parseInt(id, 10))
          .filter((id) => !Number.isNaN(id))
      : value,
  )
  @IsArray()
  @IsInt({ each: true })
  excludeIds?: number[];
}

export class RunAndBindDto {
  @ApiPropertyOptional({
    description: 'Domains whose hosts receive the certificate (defaults to the task domains)',
    type: [String],
  })
  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  domains?: string[];
}

export class TaskScopeQueryDto {
  @ApiPropertyOptional({ description: 'Only act on the task if this user owns it' })
  @IsOptional()
  @IsInt()
  @Min(1)
  @Type(() => Number)
  userId?: number;
}

export class ListTaskLogsQueryDto extends TaskScopeQueryDto {
  @ApiPropertyOptional({ description: 'Number of entries', default: 20 })
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(100)
  @Type(() => Number)
  limit?: number = 20;
}

export class CreateAcmeTaskResponseDto {
  @ApiProperty({ description: 'New task ID' })
  id!: number;
}

export class AcmeTaskResponseDto {
  @ApiProperty() id!: number;
  @ApiProperty() adminId!: number;
  @ApiProperty() userId!: number;
  @ApiProperty({ enum: [...ACME_AUTH_TYPES] }) authType!: AcmeAuthType;
  @ApiProperty() acmeUserId!: number;
  @ApiPropertyOptional({ nullable: true }) dnsProviderId!: number | null;
  @ApiProperty() dnsDomain!: string;
  @ApiProperty({ type: [String] }) domains!: string[];
  @ApiProperty() autoRenew!: boolean;
  @ApiProperty() authUrl!: string;
  @ApiProperty() isOn!: boolean;
  @ApiProperty({ description: '0 pending, 1 done, 2 running, 3 issue failed' }) status!: number;
  @ApiPropertyOptional({ nullable: true }) certId!: number | null;
  @ApiProperty() async!: boolean;
  @ApiProperty() createdAt!: Date;
  @ApiProperty() updatedAt!: Date;
}

export class ListAcmeTasksResponseDto {
  @ApiProperty({ type: [AcmeTaskResponseDto] })
  data!: AcmeTaskResponseDto[];

  @ApiProperty({ description: 'Total count for pagination' })
  total!: number;
}

export class AcmeRunResultDto {
  @ApiProperty() isOk!: boolean;
  @ApiProperty({ description: 'Failure message, empty on success' }) error!: string;
  @ApiProperty({ description: 'Bound certificate, 0 if none' }) certId!: number;
}

export class AcmeBindRunResultDto {
  @ApiProperty() isOk!: boolean;
  @ApiProperty({ description: 'Failure message, empty on success' }) error!: string;
}

export class AcmeTaskLogResponseDto {
  @ApiProperty() id!: number;
  @ApiProperty() taskId!: number;
  @ApiProperty() isOk!: boolean;
  @ApiProperty() error!: string;
  @ApiProperty() createdAt!: Date;
}
