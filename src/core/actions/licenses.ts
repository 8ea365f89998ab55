/**
 * License removal and SKU availability
 */

import { z } from 'zod';
import { SubscribedSku } from '../../types';
import { GraphTransport, expectSuccess, userPath } from '../graph';
import { PageOptions, fetchAll } from '../pager';
import { describeIssues, subscribedSkuSchema } from '../schemas';
import { RequestError } from '../../utils/errors';
import { logger } from '../../utils/logger';

export interface SkuAvailability {
  skuPartNumber: string;
  remainingUnits: number;
}

const assignedLicensesSchema = z.object({
  assignedLicenses: z.array(z.object({ skuId: z.string() })).default([]),
});

export async function getAssignedSkuIds(transport: GraphTransport, userPrincipalName: string): Promise<string[]> {
  const action = `Reading assigned licenses for ${userPrincipalName}`;
  const response = await transport.get(`${userPath(userPrincipalName)}?$select=assignedLicenses`);
  const text = await expectSuccess(response, action);

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    throw new RequestError(action, response.status, `Response is not JSON: ${text}`);
  }
  const parsed = assignedLicensesSchema.safeParse(json);
  if (!parsed.success) {
    throw new RequestError(action, response.status, describeIssues(parsed.error));
  }
  return parsed.data.assignedLicenses.map((license) => license.skuId);
}

/**
 * Remove every license assigned to the user. Returns the SKU ids removed.
 */
export async function removeLicenses(transport: GraphTransport, userPrincipalName: string): Promise<string[]> {
  const skuIds = await getAssignedSkuIds(transport, userPrincipalName);
  if (skuIds.length === 0) {
    logger.info(`No licenses assigned to ${userPrincipalName}`);
    return [];
  }

  const response = await transport.post(userPath(userPrincipalName, 'assignLicense'), {
    addLicenses: [],
    removeLicenses: skuIds,
  });
  await expectSuccess(response, `Removing licenses from ${userPrincipalName}`);

  logger.info(`Removed ${skuIds.length} license(s) from ${userPrincipalName}`);
  return skuIds;
}

export function shouldIncludeSku(requested: string[], skuPartNumber: string): boolean {
  return (requested.length === 1 && requested[0] === '*') || requested.includes(skuPartNumber);
}

/**
 * Remaining seats for the requested SKUs ("*" for all)
 */
export async function skuAvailability(
  transport: GraphTransport,
  requested: string[],
  options: PageOptions = {}
): Promise<SkuAvailability[]> {
  const skus: SubscribedSku[] = await fetchAll(transport, '/subscribedSkus', subscribedSkuSchema, options);

  return skus
    .filter((sku) => shouldIncludeSku(requested, sku.skuPartNumber))
    .map((sku) => ({
      skuPartNumber: sku.skuPartNumber,
      remainingUnits: sku.prepaidUnits.enabled - sku.consumedUnits,
    }));
}
