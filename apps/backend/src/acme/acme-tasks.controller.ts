import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  NotFoundException,
  Param,
  ParseIntPipe,
  Post,
  Put,
  Query,
  UseGuards,
} from '@nestjs/common';
import { ApiOperation, ApiParam, ApiResponse, ApiSecurity, ApiTags } from '@nestjs/swagger';
import { InternalSecretGuard } from '../internal/internal-secret.guard';
import { AcmeConfig } from './acme.config';
import { AcmeTaskLogsService } from './acme-task-logs.service';
import { AcmeTaskRunnerService } from './acme-task-runner.service';
import { AcmeTasksService } from './acme-tasks.service';
import {
  AcmeBindRunResultDto,
  AcmeRunResultDto,
  AcmeTaskLogResponseDto,
  AcmeTaskResponseDto,
  CreateAcmeTaskDto,
  CreateAcmeTaskResponseDto,
  ListAcmeTasksQueryDto,
  ListAcmeTasksResponseDto,
  ListIssuableTasksQueryDto,
  ListTaskLogsQueryDto,
  RunAndBindDto,
  TaskScopeQueryDto,
  UpdateAcmeTaskDto,
} from './dto/acme-task.dto';

@ApiTags('ACME Tasks')
@Controller('api/acme/tasks')
@UseGuards(InternalSecretGuard)
@ApiSecurity('internal-secret')
export class AcmeTasksController {
  constructor(
    private readonly tasksService: AcmeTasksService,
    private readonly taskLogsService: AcmeTaskLogsService,
    private readonly runner: AcmeTaskRunnerService,
    private readonly acmeConfig: AcmeConfig,
  ) {}

  @Post()
  @ApiOperation({ summary: 'Create an issuance task' })
  @ApiResponse({ status: 201, type: CreateAcmeTaskResponseDto })
  @ApiResponse({ status: 400, description: 'Invalid input' })
  async create(@Body() dto: CreateAcmeTaskDto): Promise<CreateAcmeTaskResponseDto> {
    const id = await this.tasksService.createTask({
      adminId: dto.adminId ?? 0,
      userId: dto.userId ?? 0,
      authType: dto.authType,
      acmeUserId: dto.acmeUserId,
      dnsProviderId: dto.dnsProviderId,
      dnsDomain: dto.dnsDomain,
      domains: dto.domains,
      autoRenew: dto.autoRenew ?? true,
      authUrl: dto.authUrl,
      async: dto.async ?? false,
    });
    return { id };
  }

  @Get()
  @ApiOperation({ summary: 'List tasks, newest first' })
  @ApiResponse({ status: 200, type: ListAcmeTasksResponseDto })
  async list(@Query() query: ListAcmeTasksQueryDto): Promise<ListAcmeTasksResponseDto> {
    const filter = {
      userId: query.userId,
      userOnly: query.userOnly,
      isAvailable: query.isAvailable,
      isExpired: query.isExpired,
      expiringDays: query.expiringDays,
      keyword: query.keyword,
    };
    const [data, total] = await Promise.all([
      this.tasksService.listTasks(filter, query.offset ?? 0, query.size ?? 20),
      this.tasksService.countTasks(filter),
    ]);
    return { data, total };
  }

  @Get('issuable')
  @ApiOperation({ summary: 'Tasks the issuance poller would pick up next' })
  @ApiResponse({ status: 200, type: [AcmeTaskResponseDto] })
  async listIssuable(@Query() query: ListIssuableTasksQueryDto): Promise<AcmeTaskResponseDto[]> {
    return this.tasksService.listIssuableTasks(
      query.staleHours ?? this.acmeConfig.schedulerStaleHours,
      query.limit ?? this.acmeConfig.schedulerBatchSize,
      query.excludeIds ?? [],
    );
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get a task' })
  @ApiParam({ name: 'id', description: 'Task ID' })
  @ApiResponse({ status: 200, type: AcmeTaskResponseDto })
  @ApiResponse({ status: 404, description: 'Task not found' })
  async findOne(
    @Param('id', ParseIntPipe) id: number,
    @Query() scope: TaskScopeQueryDto,
  ): Promise<AcmeTaskResponseDto> {
    await this.assertScope(id, scope);
    const task = await this.tasksService.findEnabledTask(id);
    if (!task) {
      throw new NotFoundException(`Task ${id} not found`);
    }
    return task;
  }

  @Put(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Update the account, DNS settings or domains of a task' })
  @ApiParam({ name: 'id', description: 'Task ID' })
  async update(
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: UpdateAcmeTaskDto,
    @Query() scope: TaskScopeQueryDto,
  ): Promise<void> {
    await this.assertScope(id, scope);
    await this.tasksService.updateTask(id, dto);
  }

  @Post(':id/enable')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Enable a task' })
  async enable(
    @Param('id', ParseIntPipe) id: number,
    @Query() scope: TaskScopeQueryDto,
  ): Promise<void> {
    await this.assertScope(id, scope);
    await this.tasksService.enableTask(id);
  }

  @Post(':id/disable')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Disable a task; a run in progress finishes' })
  async disable(
    @Param('id', ParseIntPipe) id: number,
    @Query() scope: TaskScopeQueryDto,
  ): Promise<void> {
    await this.assertScope(id, scope);
    await this.tasksService.disableTask(id);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Delete a task; its certificate is kept' })
  async remove(
    @Param('id', ParseIntPipe) id: number,
    @Query() scope: TaskScopeQueryDto,
  ): Promise<void> {
    await this.assertScope(id, scope);
    await this.tasksService.deleteTask(id);
  }

  @Post(':id/run')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Issue or renew the certificate of a task' })
  @ApiResponse({ status: 200, type: AcmeRunResultDto })
  async run(
    @Param('id', ParseIntPipe) id: number,
    @Query() scope: TaskScopeQueryDto,
  ): Promise<AcmeRunResultDto> {
    await this.assertScope(id, scope);
    return this.runner.runTask(id);
  }

  @Post(':id/run-and-bind')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Issue with a rotated account and bind to matching hosts' })
  @ApiResponse({ status: 200, type: AcmeBindRunResultDto })
  @ApiResponse({ status: 404, description: 'Task not found' })
  async runAndBind(
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: RunAndBindDto,
    @Query() scope: TaskScopeQueryDto,
  ): Promise<AcmeBindRunResultDto> {
    await this.assertScope(id, scope);
    let domains = dto.domains;
    if (!domains || domains.length === 0) {
      const task = await this.tasksService.findEnabledTask(id);
      if (!task) {
        throw new NotFoundException(`Task ${id} not found`);
      }
      domains = task.domains;
    }
    return this.runner.runTaskAndBind(id, domains);
  }

  @Get(':id/logs')
  @ApiOperation({ summary: 'Latest execution log entries of a task' })
  @ApiResponse({ status: 200, type: [AcmeTaskLogResponseDto] })
  async logs(
    @Param('id', ParseIntPipe) id: number,
    @Query() query: ListTaskLogsQueryDto,
  ): Promise<AcmeTaskLogResponseDto[]> {
    await this.assertScope(id, query);
    return this.taskLogsService.listLogs(id, query.limit ?? 20);
  }

  /**
   * User-scoped callers pass their userId; another user's task reads as missing
   */
  private async assertScope(id: number, scope: TaskScopeQueryDto): Promise<void> {
    if (scope.userId === undefined) {
      return;
    }
    if (!(await this.tasksService.checkUserTask(scope.userId, id))) {
      throw new NotFoundException(`Task ${id} not found`);
    }
  }
}
