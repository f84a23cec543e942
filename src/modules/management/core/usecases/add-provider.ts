/**
 * Add Provider Use Case
 *
 * Name, type and city are required; address and contact are optional.
 * Nothing is written when validation fails.
 */

import { ok, err, type Result } from 'neverthrow';

import { optionalText, requireText } from '../validation.js';

import type { ManagementError } from '../errors.js';
import type { ManagementRepository } from '../ports.js';

export interface AddProviderDeps {
  managementRepo: ManagementRepository;
}

export interface AddProviderInput {
  name?: string | undefined;
  type?: string | undefined;
  address?: string | undefined;
  city?: string | undefined;
  contact?: string | undefined;
}

export interface AddProviderResult {
  providerId: number;
}

export const addProvider = async (
  deps: AddProviderDeps,
  input: AddProviderInput
): Promise<Result<AddProviderResult, ManagementError>> => {
  const name = requireText('name', 'Name', input.name);
  if (name.isErr()) return err(name.error);

  const type = requireText('type', 'Type', input.type);
  if (type.isErr()) return err(type.error);

  const city = requireText('city', 'City', input.city);
  if (city.isErr()) return err(city.error);

  const insertResult = await deps.managementRepo.insertProvider({
    name: name.value,
    type: type.value,
    address: optionalText(input.address),
    city: city.value,
    contact: optionalText(input.contact),
  });

  if (insertResult.isErr()) {
    return err(insertResult.error);
  }

  return ok({ providerId: insertResult.value });
};
