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
import { PatientsService } from '../services/patients.service';
import {
  PatientLastNameQueryDto,
  PatientPhoneQueryDto,
  PatientRequestDto,
  PatientResponseDto,
} from '../dto/patient.dto';
import { requestMetadata } from '../../../shared/utils/request-metadata';

@ApiTags('Patients')
@Controller('patients')
export class PatientController {
  constructor(private readonly patientsService: PatientsService) {}

  @Post()
  @ApiOperation({ summary: 'Register a patient', description: 'Email addresses are unique across patients' })
  @ApiBody({ type: PatientRequestDto })
  @ApiResponse({ status: HttpStatus.CREATED, type: PatientResponseDto })
  @ApiResponse({ status: HttpStatus.BAD_REQUEST, description: 'Invalid input data' })
  @ApiResponse({ status: HttpStatus.CONFLICT, description: 'Email already registered' })
  async create(@Body() patientDto: PatientRequestDto, @Req() req: Request): Promise<PatientResponseDto> {
    return this.patientsService.create(patientDto, requestMetadata(req));
  }

  @Get()
  @ApiOperation({ summary: 'List patients' })
  @ApiResponse({ status: HttpStatus.OK, type: [PatientResponseDto] })
  async findAll(): Promise<PatientResponseDto[]> {
    return this.patientsService.findAll();
  }

  @Get('search')
  @ApiOperation({ summary: 'Find a patient by phone number' })
  @ApiResponse({ status: HttpStatus.OK, type: PatientResponseDto })
  @ApiResponse({ status: HttpStatus.NOT_FOUND, description: 'No patient with this phone number' })
  async findByPhone(@Query() query: PatientPhoneQueryDto): Promise<PatientResponseDto> {
    return this.patientsService.findByPhone(query.phone);
  }

  @Get('by-lastname')
  @ApiOperation({ summary: 'List patients with a last name' })
  @ApiResponse({ status: HttpStatus.OK, type: [PatientResponseDto] })
  async findByLastName(@Query() query: PatientLastNameQueryDto): Promise<PatientResponseDto[]> {
    return this.patientsService.findByLastName(query.lastName);
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get a patient by id' })
  @ApiParam({ name: 'id', description: 'Patient id' })
  @ApiResponse({ status: HttpStatus.OK, type: PatientResponseDto })
  @ApiResponse({ status: HttpStatus.NOT_FOUND, description: 'Patient not found' })
  async findOne(@Param('id') id: string): Promise<PatientResponseDto> {
    return this.patientsService.findOne(id);
  }

  @Put(':id')
  @ApiOperation({ summary: 'Update a patient' })
  @ApiParam({ name: 'id', description: 'Patient id' })
  @ApiBody({ type: PatientRequestDto })
  @ApiResponse({ status: HttpStatus.OK, type: PatientResponseDto })
  @ApiResponse({ status: HttpStatus.NOT_FOUND, description: 'Patient not found' })
  @ApiResponse({ status: HttpStatus.CONFLICT, description: 'Email already registered' })
  async update(
    @Param('id') id: string,
    @Body() patientDto: PatientRequestDto,
    @Req() req: Request,
  ): Promise<PatientResponseDto> {
    return this.patientsService.update(id, patientDto, requestMetadata(req));
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Delete a patient' })
  @ApiParam({ name: 'id', description: 'Patient id' })
  @ApiResponse({ status: HttpStatus.NO_CONTENT, description: 'Patient deleted' })
  @ApiResponse({ status: HttpStatus.NOT_FOUND, description: 'Patient not found' })
  async remove(@Param('id') id: string, @Req() req: Request): Promise<void> {
    await this.patientsService.remove(id, requestMetadata(req));
  }
}
