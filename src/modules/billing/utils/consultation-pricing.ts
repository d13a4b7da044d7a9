/** Premium on top of the base fee, in percent, keyed by lower-case specialization */
const SPECIALIZATION_PREMIUM_PERCENT: Readonly<Record<string, number>> = {
  cardiology: 50,
  neurology: 45,
  oncology: 40,
  orthopedics: 35,
  pediatrics: 25,
  dermatology: 20,
  'general medicine': 10,
  'family medicine': 5,
};

export interface ConsultationPrice {
  baseAmountCents: number;
  premiumCents: number;
  totalAmountCents: number;
}

export function premiumPercent(specialization: string): number {
  return SPECIALIZATION_PREMIUM_PERCENT[specialization.trim().toLowerCase()] ?? 0;
}

/**
 * Base fee plus the specialization premium. The premium is rounded half up to
 * whole cents; unlisted specializations carry none.
 */
export function priceConsultation(specialization: string, baseAmountCents: number): ConsultationPrice {
  const premiumCents = Math.round((baseAmountCents * premiumPercent(specialization)) / 100);
  return {
    baseAmountCents,
    premiumCents,
    totalAmountCents: baseAmountCents + premiumCents,
  };
}

export function centsToAmount(cents: number): number {
  return cents / 100;
}
