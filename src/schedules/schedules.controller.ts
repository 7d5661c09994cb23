import { Body, Controller, Get, Options, Param, Post, Put, Query, Res } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { Response } from 'express';
import { CreateScheduleDto, ScheduleListQueryDto, UpdateScheduleStatusDto } from './dto/schedule.dto';
import { SchedulesService } from './schedules.service';

@ApiTags('schedules')
@Controller('schedules')
export class SchedulesController {
  constructor(private readonly schedules: SchedulesService) {}

  @Get()
  async listSchedules(@Query() query: ScheduleListQueryDto, @Res() res: Response): Promise<void> {
    const { status, data } = await this.schedules.list(query);
    res.status(status).json(data);
  }

  @Post()
  async createSchedule(@Body() body: CreateScheduleDto, @Res() res: Response): Promise<void> {
    const { status, data } = await this.schedules.create(body);
    res.status(status).json(data);
  }

  @Put(':scheduleId/status')
  async updateScheduleStatus(
    @Param('scheduleId') scheduleId: string,
    // only cancellation is exposed; the DTO rejects every other status
    @Body() _body: UpdateScheduleStatusDto,
    @Res() res: Response,
  ): Promise<void> {
    const { status, data } = await this.schedules.cancel(scheduleId);
    res.status(status).json(data);
  }

  @Options()
  preflight(): Record<string, never> {
    return {};
  }
}
