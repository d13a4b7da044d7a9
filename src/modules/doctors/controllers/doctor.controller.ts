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
  Req,
} from '@nestjs/common';
import { ApiBody, ApiOperation, ApiParam, ApiResponse, ApiTags } from '@nestjs/swagger';
import { Request } from 'express';
import { DoctorsService } from '../services/doctors.service';
import { DoctorRequestDto, DoctorResponseDto } from '../dto/doctor.dto';
import { requestMetadata } from '../../../shared/utils/request-metadata';

@ApiTags('Doctors')
@Controller('doctors')
export class DoctorController {
  constructor(private readonly doctorsService: DoctorsService) {}

  @Post()
  @ApiOperation({ summary: 'Register a doctor', description: 'License numbers are unique across doctors' })
  @ApiBody({ type: DoctorRequestDto })
  @ApiResponse({ status: HttpStatus.CREATED, type: DoctorResponseDto })
  @ApiResponse({ status: HttpStatus.BAD_REQUEST, description: 'Invalid input data' })
  @ApiResponse({ status: HttpStatus.CONFLICT, description: 'License number already registered' })
  async create(@Body() doctorDto: DoctorRequestDto, @Req() req: Request): Promise<DoctorResponseDto> {
    return this.doctorsService.create(doctorDto, requestMetadata(req));
  }

  @Get()
  @ApiOperation({ summary: 'List doctors' })
  @ApiResponse({ status: HttpStatus.OK, type: [DoctorResponseDto] })
  async findAll(): Promise<DoctorResponseDto[]> {
    return this.doctorsService.findAll();
  }

  @Get('license/:licenseNumber')
  @ApiOperation({ summary: 'Get a doctor by license number' })
  @ApiParam({ name: 'licenseNumber' })
  @ApiResponse({ status: HttpStatus.OK, type: DoctorResponseDto })
  @ApiResponse({ status: HttpStatus.NOT_FOUND, description: 'Doctor not found' })
  async findByLicenseNumber(@Param('licenseNumber') licenseNumber: string): Promise<DoctorResponseDto> {
    return this.doctorsService.findByLicenseNumber(licenseNumber);
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get a doctor by id' })
  @ApiParam({ name: 'id', description: 'Doctor id' })
  @ApiResponse({ status: HttpStatus.OK, type: DoctorResponseDto })
  @ApiResponse({ status: HttpStatus.NOT_FOUND, description: 'Doctor not found' })
  async findOne(@Param('id') id: string): Promise<DoctorResponseDto> {
    return this.doctorsService.findOne(id);
  }

  @Put(':id')
  @ApiOperation({ summary: 'Update a doctor' })
  @ApiParam({ name: 'id', description: 'Doctor id' })
  @ApiBody({ type: DoctorRequestDto })
  @ApiResponse({ status: HttpStatus.OK, type: DoctorResponseDto })
  @ApiResponse({ status: HttpStatus.NOT_FOUND, description: 'Doctor not found' })
  @ApiResponse({ status: HttpStatus.CONFLICT, description: 'License number already registered' })
  async update(
    @Param('id') id: string,
    @Body() doctorDto: DoctorRequestDto,
    @Req() req: Request,
  ): Promise<DoctorResponseDto> {
    return this.doctorsService.update(id, doctorDto, requestMetadata(req));
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Delete a doctor' })
  @ApiParam({ name: 'id', description: 'Doctor id' })
  @ApiResponse({ status: HttpStatus.NO_CONTENT, description: 'Doctor deleted' })
  @ApiResponse({ status: HttpStatus.NOT_FOUND, description: 'Doctor not found' })
  async remove(@Param('id') id: string, @Req() req: Request): Promise<void> {
    await this.doctorsService.remove(id, requestMetadata(req));
  }
}
