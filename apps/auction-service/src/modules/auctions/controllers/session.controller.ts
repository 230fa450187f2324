import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseUUIDPipe,
  Post,
  Query,
  UseGuards,
} from '@nestjs/common';
import { Actor } from '@gemhouse/shared';
import { JwtAuthGuard } from '../../../common/guards/jwt-auth.guard';
import { CurrentUser } from '../../../common/decorators/current-user.decorator';
import { SessionService } from '../services/session.service';
import { EnrollmentService } from '../services/enrollment.service';
import { CreateSessionDto } from '../dto/create-session.dto';
import { AddLotDto } from '../dto/add-lot.dto';
import { ListEnrollmentsQueryDto, ListSessionsQueryDto } from '../dto/list-sessions-query.dto';

@Controller('sessions')
export class SessionController {
  constructor(
    private readonly sessions: SessionService,
    private readonly enrollments: EnrollmentService,
  ) {}

  @Get()
  async list(@Query() query: ListSessionsQueryDto) {
    return this.sessions.list({ status: query.status, search: query.search }, query);
  }

  @Get(':id')
  async findById(@Param('id', ParseUUIDPipe) id: string) {
    return this.sessions.findById(id);
  }

  @Get(':id/lots')
  async listLots(@Param('id', ParseUUIDPipe) id: string) {
    return this.sessions.listItems(id);
  }

  @Post()
  @UseGuards(JwtAuthGuard)
  @HttpCode(HttpStatus.CREATED)
  async create(@CurrentUser() actor: Actor, @Body() dto: CreateSessionDto) {
    return this.sessions.createSession(actor, {
      ...dto,
      startAt: new Date(dto.startAt),
      endAt: new Date(dto.endAt),
    });
  }

  @Post(':id/lots')
  @UseGuards(JwtAuthGuard)
  @HttpCode(HttpStatus.CREATED)
  async addLot(@CurrentUser() actor: Actor, @Param('id', ParseUUIDPipe) id: string, @Body() dto: AddLotDto) {
    const { sellRequestId, ...pricing } = dto;
    return this.sessions.addItemToSession(actor, id, sellRequestId, pricing);
  }

  @Post(':id/schedule')
  @UseGuards(JwtAuthGuard)
  @HttpCode(HttpStatus.OK)
  async schedule(@CurrentUser() actor: Actor, @Param('id', ParseUUIDPipe) id: string) {
    return this.sessions.scheduleSession(actor, id);
  }

  @Post(':id/open')
  @UseGuards(JwtAuthGuard)
  @HttpCode(HttpStatus.OK)
  async open(@CurrentUser() actor: Actor, @Param('id', ParseUUIDPipe) id: string) {
    return this.sessions.openSession(actor, id);
  }

  @Post(':id/pause')
  @UseGuards(JwtAuthGuard)
  @HttpCode(HttpStatus.OK)
  async pause(@CurrentUser() actor: Actor, @Param('id', ParseUUIDPipe) id: string) {
    return this.sessions.pauseSession(actor, id);
  }

  @Post(':id/close')
  @UseGuards(JwtAuthGuard)
  @HttpCode(HttpStatus.OK)
  async close(@CurrentUser() actor: Actor, @Param('id', ParseUUIDPipe) id: string) {
    return this.sessions.closeSession(actor, id);
  }

  @Post(':id/cancel')
  @UseGuards(JwtAuthGuard)
  @HttpCode(HttpStatus.OK)
  async cancel(@CurrentUser() actor: Actor, @Param('id', ParseUUIDPipe) id: string) {
    return this.sessions.cancelSession(actor, id);
  }

  @Post(':id/enrollments')
  @UseGuards(JwtAuthGuard)
  @HttpCode(HttpStatus.CREATED)
  async enroll(@CurrentUser() actor: Actor, @Param('id', ParseUUIDPipe) id: string) {
    return this.enrollments.enroll(actor, id);
  }

  @Get(':id/enrollments')
  @UseGuards(JwtAuthGuard)
  async listEnrollments(
    @CurrentUser() actor: Actor,
    @Param('id', ParseUUIDPipe) id: string,
    @Query() query: ListEnrollmentsQueryDto,
  ) {
    return this.enrollments.list(actor, id, { status: query.status }, query);
  }
}
