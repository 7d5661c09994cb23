import { Body, Controller, Get, Post, Query, Res } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { Response } from 'express';
import { CreateResourceDto, ResourceListQueryDto } from './dto/resource.dto';
import { ResourcesService } from './resources.service';

@ApiTags('resources')
@Controller('resources')
export class ResourcesController {
  constructor(private readonly resources: ResourcesService) {}

  @Get()
  async listResources(@Query() query: ResourceListQueryDto, @Res() res: Response): Promise<void> {
    const { status, data } = await this.resources.list(query);
    res.status(status).json(data);
  }

  @Post()
  async createResource(@Body() body: CreateResourceDto, @Res() res: Response): Promise<void> {
    const { status, data } = await this.resources.create(body);
    res.status(status).json(data);
  }
}
