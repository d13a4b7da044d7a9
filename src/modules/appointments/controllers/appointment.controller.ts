import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Patch,
  Post,
  Put,
  Query,
  Req,
} from '@nestjs/common';
import { ApiBody, ApiOperation, ApiParam, ApiResponse, ApiTags } from '@nestjs/swagger';
import { Request } from 'express';
import { AppointmentsService } from '../services/appointments.service';
import {
  AppointmentQueryDto,
  AppointmentRequestDto,
  AppointmentResponseDto,
} from '../dto/appointment.dto';
import { requestMetadata } from '../../../shared/utils/request-metadata';

@ApiTags('Appointments')
@Controller('appointments')
export class AppointmentController {
  constructor(private readonly appointmentsService: AppointmentsService) {}

  @Post()
  @ApiOperation({
    summary: 'Schedule an appointment',
    description: 'The shift must belong to the doctor and contain the appointment time (UTC).',
  })
  @ApiBody({ type: AppointmentRequestDto })
  @ApiResponse({ status: HttpStatus.CREATED, type: AppointmentResponseDto })
  @ApiResponse({ status: HttpStatus.BAD_REQUEST, description: 'Invalid input data or time outside the shift' })
  @ApiResponse({ status: HttpStatus.NOT_FOUND, description: 'Patient, doctor or shift not found' })
  async create(@Body() appointmentDto: AppointmentRequestDto, @Req() req: Request): Promise<AppointmentResponseDto> {
    return this.appointmentsService.create(appointmentDto, requestMetadata(req));
  }

  @Get()
  @ApiOperation({ summary: 'List appointments', description: 'Optionally filtered by patient, doctor and status' })
  @ApiResponse({ status: HttpStatus.OK, type: [AppointmentResponseDto] })
  async findAll(@Query() query: AppointmentQueryDto): Promise<AppointmentResponseDto[]> {
    return this.appointmentsService.findAll(query);
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get an appointment by id' })
  @ApiParam({ name: 'id', description: 'Appointment id' })
  @ApiResponse({ status: HttpStatus.OK, type: AppointmentResponseDto })
  @ApiResponse({ status: HttpStatus.NOT_FOUND, description: 'Appointment not found' })
  async findOne(@Param('id') id: string): Promise<AppointmentResponseDto> {
    return this.appointmentsService.findOne(id);
  }

  @Put(':id')
  @ApiOperation({ summary: 'Reschedule an appointment', description: 'Only scheduled appointments can change' })
  @ApiParam({ name: 'id', description: 'Appointment id' })
  @ApiBody({ type: AppointmentRequestDto })
  @ApiResponse({ status: HttpStatus.OK, type: AppointmentResponseDto })
  @ApiResponse({ status: HttpStatus.NOT_FOUND, description: 'Appointment, patient, doctor or shift not found' })
  @ApiResponse({ status: HttpStatus.CONFLICT, description: 'Appointment already completed or cancelled' })
  async update(
    @Param('id') id: string,
    @Body() appointmentDto: AppointmentRequestDto,
    @Req() req: Request,
  ): Promise<AppointmentResponseDto> {
    return this.appointmentsService.update(id, appointmentDto, requestMetadata(req));
  }

  @Patch(':id/complete')
  @ApiOperation({ summary: 'Mark an appointment as completed' })
  @ApiParam({ name: 'id', description: 'Appointment id' })
  @ApiResponse({ status: HttpStatus.OK, type: AppointmentResponseDto })
  @ApiResponse({ status: HttpStatus.NOT_FOUND, description: 'Appointment not found' })
  @ApiResponse({ status: HttpStatus.CONFLICT, description: 'Appointment already completed or cancelled' })
  async complete(@Param('id') id: string, @Req() req: Request): Promise<AppointmentResponseDto> {
    return this.appointmentsService.complete(id, requestMetadata(req));
  }

  @Patch(':id/cancel')
  @ApiOperation({ summary: 'Cancel an appointment' })
  @ApiParam({ name: 'id', description: 'Appointment id' })
  @ApiResponse({ status: HttpStatus.OK, type: AppointmentResponseDto })
  @ApiResponse({ status: HttpStatus.NOT_FOUND, description: 'Appointment not found' })
  @ApiResponse({ status: HttpStatus.CONFLICT, description: 'Appointment already completed or cancelled' })
  async cancel(@Param('id') id: string, @Req() req: Request): Promise<AppointmentResponseDto> {
    return this.appointmentsService.cancel(id, requestMetadata(req));
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Delete an appointment' })
  @ApiParam({ name: 'id', description: 'Appointment id' })
  @ApiResponse({ status: HttpStatus.NO_CONTENT, description: 'Appointment deleted' })
  @ApiResponse({ status: HttpStatus.NOT_FOUND, description: 'Appointment not found' })
  async remove(@Param('id') id: string, @Req() req: Request): Promise<void> {
    await this.appointmentsService.remove(id, requestMetadata(req));
  }
}
