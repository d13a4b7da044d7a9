import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
  Put,
  Query,
  Req,
} from '@nestjs/common';
import { ApiBody, ApiOperation, ApiParam, ApiResponse, ApiTags } from '@nestjs/swagger';
import { Request } from 'express';
import { ShiftLifecycleService } from '../services/shift-lifecycle.service';
import { ShiftQueryDto, ShiftRequestDto, ShiftResponseDto } from '../dto/shift.dto';
import { ShiftRecord } from '../interfaces/shift.interface';
import { requestMetadata } from '../../../shared/utils/request-metadata';
import { ShiftResult } from '../interfaces/shift-result.interface';
import { shiftErrorToHttpException } from '../utils/shift-error.mapper';

@ApiTags('Shifts')
@Controller('shifts')
export class ShiftController {
  constructor(private readonly shiftLifecycleService: ShiftLifecycleService) {}

  @Post()
  @ApiOperation({
    summary: 'Create a shift',
    description: 'Books a shift for a doctor. End time must be strictly after start time and must not overlap another shift of the same doctor.',
  })
  @ApiBody({ type: ShiftRequestDto })
  @ApiResponse({ status: HttpStatus.CREATED, description: 'Shift created', type: ShiftResponseDto })
  @ApiResponse({ status: HttpStatus.BAD_REQUEST, description: 'Invalid request data or invalid time slot' })
  @ApiResponse({ status: HttpStatus.NOT_FOUND, description: 'Doctor not found' })
  @ApiResponse({ status: HttpStatus.CONFLICT, description: 'Overlaps an existing shift of the doctor' })
  async create(@Body() shiftRequestDto: ShiftRequestDto, @Req() req: Request): Promise<ShiftResponseDto> {
    return unwrap(await this.shiftLifecycleService.create(shiftRequestDto, requestMetadata(req)));
  }

  @Get()
  @ApiOperation({ summary: 'List shifts', description: 'All shifts, or the shifts of one doctor' })
  @ApiResponse({ status: HttpStatus.OK, type: [ShiftResponseDto] })
  async findAll(@Query() query: ShiftQueryDto): Promise<ShiftResponseDto[]> {
    const shifts = await this.shiftLifecycleService.findAll(query.doctorId);
    return shifts.map(toShiftResponse);
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get a shift by id' })
  @ApiParam({ name: 'id', description: 'Shift id' })
  @ApiResponse({ status: HttpStatus.OK, type: ShiftResponseDto })
  @ApiResponse({ status: HttpStatus.NOT_FOUND, description: 'Shift not found' })
  async findOne(@Param('id') id: string): Promise<ShiftResponseDto> {
    return unwrap(await this.shiftLifecycleService.findOne(id));
  }

  @Put(':id')
  @ApiOperation({
    summary: 'Update a shift',
    description: 'Replaces every field of the shift. The shift never conflicts with its own previous version.',
  })
  @ApiParam({ name: 'id', description: 'Shift id' })
  @ApiBody({ type: ShiftRequestDto })
  @ApiResponse({ status: HttpStatus.OK, type: ShiftResponseDto })
  @ApiResponse({ status: HttpStatus.BAD_REQUEST, description: 'Invalid request data or invalid time slot' })
  @ApiResponse({ status: HttpStatus.NOT_FOUND, description: 'Shift or doctor not found' })
  @ApiResponse({ status: HttpStatus.CONFLICT, description: 'Overlaps another shift of the doctor' })
  async update(
    @Param('id') id: string,
    @Body() shiftRequestDto: ShiftRequestDto,
    @Req() req: Request,
  ): Promise<ShiftResponseDto> {
    return unwrap(await this.shiftLifecycleService.update(id, shiftRequestDto, requestMetadata(req)));
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Delete a shift' })
  @ApiParam({ name: 'id', description: 'Shift id' })
  @ApiResponse({ status: HttpStatus.NO_CONTENT, description: 'Shift deleted' })
  @ApiResponse({ status: HttpStatus.NOT_FOUND, description: 'Shift not found' })
  async remove(@Param('id') id: string, @Req() req: Request): Promise<void> {
    const result = await this.shiftLifecycleService.remove(id, requestMetadata(req));
    if (!result.success) {
      throw shiftErrorToHttpException(result.error);
    }
  }
}

function unwrap(result: ShiftResult<ShiftRecord>): ShiftResponseDto {
  if (!result.success) {
    throw shiftErrorToHttpException(result.error);
  }
  return toShiftResponse(result.data);
}

function toShiftResponse(shift: ShiftRecord): ShiftResponseDto {
  return {
    id: shift.id,
    doctorId: shift.doctorId,
    start: shift.start,
    end: shift.end,
    room: shift.room,
    createdAt: shift.createdAt,
    updatedAt: shift.updatedAt,
  };
}
