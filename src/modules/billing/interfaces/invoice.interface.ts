export const PAYMENT_STATUSES = ['pending', 'paid', 'partially_paid', 'cancelled', 'refunded'] as const;
export type PaymentStatus = (typeof PAYMENT_STATUSES)[number];

/** Amounts are decimal currency units with at most two decimals */
export interface InvoiceRecord {
  id: string;
  appointmentId: string;
  patientId: string;
  doctorId: string;
  patientName: string;
  doctorName: string;
  specialization: string;
  baseAmount: number;
  specializationPremium: number;
  totalAmount: number;
  paymentStatus: PaymentStatus;
  createdAt: Date;
  updatedAt: Date;
}
