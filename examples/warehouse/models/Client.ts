import { ArgumentException, Guard } from '../../../src';
import { optionalDate, requireDate, requireOneOf } from './common';

export const CLIENT_TIERS = ['Standard', 'Premium', 'Enterprise'] as const;

export type ClientTier = (typeof CLIENT_TIERS)[number];

/**
 * A customer whose goods the warehouse stores and ships.
 */
export interface Client {
  readonly id: string;
  readonly name: string;
  readonly contactEmail: string;
  readonly tier: ClientTier;
  readonly contractStartDate: Date;
  /** Open-ended contracts have no end date */
  readonly contractEndDate?: Date;
  readonly isActive: boolean;
}

export interface ClientInput {
  id: string;
  name: string;
  contactEmail: string;
  tier: ClientTier;
  contractStartDate: Date;
  contractEndDate?: Date;
  /** @defaultValue true */
  isActive?: boolean;
}

/**
 * @throws ArgumentException for blank text fields or an end date that is not
 * after the start date
 */
export function createClient(input: ClientInput): Client {
  const contractStartDate = requireDate(input.contractStartDate, 'contractStartDate');
  const contractEndDate = optionalDate(input.contractEndDate, 'contractEndDate');

  if (contractEndDate && contractEndDate.getTime() <= contractStartDate.getTime()) {
    throw new ArgumentException('Contract end date must be after start date.', 'contractEndDate');
  }

  return {
    id: Guard.againstBlank(input.id, 'id'),
    name: Guard.againstBlank(input.name, 'name'),
    contactEmail: Guard.againstBlank(input.contactEmail, 'contactEmail'),
    tier: requireOneOf(CLIENT_TIERS, input.tier, 'tier'),
    contractStartDate,
    contractEndDate,
    isActive: input.isActive ?? true,
  };
}
