import { Controller, Get, HttpStatus, Param, Post, Query, Req } from '@nestjs/common';
import { ApiOperation, ApiParam, ApiResponse, ApiTags } from '@nestjs/swagger';
import { Request } from 'express';
import { BillingService } from '../services/billing.service';
import { InvoiceQueryDto, InvoiceResponseDto } from '../dto/invoice.dto';
import { requestMetadata } from '../../../shared/utils/request-metadata';

@ApiTags('Billing')
@Controller('billing')
export class BillingController {
  constructor(private readonly billingService: BillingService) {}

  @Post('appointments/:appointmentId/invoice')
  @ApiOperation({
    summary: 'Generate the invoice of a completed appointment',
    description: 'Base fee plus a premium that depends on the doctor specialization',
  })
  @ApiParam({ name: 'appointmentId', description: 'Appointment id' })
  @ApiResponse({ status: HttpStatus.CREATED, type: InvoiceResponseDto })
  @ApiResponse({ status: HttpStatus.NOT_FOUND, description: 'Appointment, doctor or patient not found' })
  @ApiResponse({ status: HttpStatus.CONFLICT, description: 'Appointment not completed or already invoiced' })
  async generateInvoice(
    @Param('appointmentId') appointmentId: string,
    @Req() req: Request,
  ): Promise<InvoiceResponseDto> {
    return this.billingService.generateInvoice(appointmentId, requestMetadata(req));
  }

  @Get('appointments/:appointmentId/invoice')
  @ApiOperation({ summary: 'Get the invoice of an appointment' })
  @ApiParam({ name: 'appointmentId', description: 'Appointment id' })
  @ApiResponse({ status: HttpStatus.OK, type: InvoiceResponseDto })
  @ApiResponse({ status: HttpStatus.NOT_FOUND, description: 'Invoice not found' })
  async findByAppointment(@Param('appointmentId') appointmentId: string): Promise<InvoiceResponseDto> {
    return this.billingService.findByAppointment(appointmentId);
  }

  @Get('patients/:patientId/invoices')
  @ApiOperation({ summary: 'List the invoices of a patient', description: 'Newest first' })
  @ApiParam({ name: 'patientId', description: 'Patient id' })
  @ApiResponse({ status: HttpStatus.OK, type: [InvoiceResponseDto] })
  async findByPatient(@Param('patientId') patientId: string): Promise<InvoiceResponseDto[]> {
    return this.billingService.findByPatient(patientId);
  }

  @Get('invoices')
  @ApiOperation({ summary: 'List invoices', description: 'Optionally filtered by payment status, newest first' })
  @ApiResponse({ status: HttpStatus.OK, type: [InvoiceResponseDto] })
  async findAll(@Query() query: InvoiceQueryDto): Promise<InvoiceResponseDto[]> {
    return this.billingService.findAll(query.paymentStatus);
  }
}
