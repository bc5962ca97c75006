/**
 * Tier configuration (YAML)
 *
 * Parses the tier list, yearly pricing and restriction roles, validates them
 * with zod and builds the immutable TierCatalog plus the tier -> role map
 * used by the Discord adapters.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import { TierCatalog } from './packages/core/domain/tier-catalog.js';
import { CatalogError } from './packages/core/errors.js';
import { ConfigError, ConfigErrorCode, toConfigDetails, type ConfigErrorDetail } from './config.js';

const Snowflake = z.string().regex(/^\d+$/, 'must be a Discord snowflake');

export const TierConfigSchema = z.object({
  tiers: z
    .array(
      z.object({
        name: z.string().min(1),
        price: z.number().int().positive(),
        priority: z.number().int(),
        baseDurationDays: z.number().int().positive().default(30),
        roleId: Snowflake,
      })
    )
    .min(1),
  yearly: z
    .object({
      months: z.number().int().positive().default(10),
      durationDays: z.number().int().positive().default(365),
    })
    .default({}),
  restrictionRoleIds: z.array(Snowflake).default([]),
  pricePoints: z.array(z.number().int().positive()).optional(),
});

export interface TierConfig {
  catalog: TierCatalog;
  /** Tier name -> Discord role id */
  roleIds: Record<string, string>;
  restrictionRoleIds: string[];
}

export function parseTierConfig(content: string): TierConfig {
  let raw: unknown;
  try {
    raw = yaml.load(content);
  } catch (error) {
    const detail: ConfigErrorDetail =
      error instanceof yaml.YAMLException
        ? { message: error.message, path: error.mark ? [`line ${error.mark.line + 1}`] : [] }
        : { message: String(error), path: [] };
    throw new ConfigError('YAML syntax error', ConfigErrorCode.YAML_PARSE_ERROR, [detail]);
  }

  const parsed = TierConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(
      'Tier configuration validation failed',
      ConfigErrorCode.VALIDATION_ERROR,
      toConfigDetails(parsed.error)
    );
  }
  const config = parsed.data;

  const referenceErrors = validateRoleReferences(config);
  if (referenceErrors.length > 0) {
    throw new ConfigError(
      'Tier configuration reference validation failed',
      ConfigErrorCode.REFERENCE_ERROR,
      referenceErrors
    );
  }

  let catalog: TierCatalog;
  try {
    catalog = new TierCatalog(
      config.tiers.map(({ name, price, priority, baseDurationDays }) => ({
        name,
        price,
        priority,
        baseDurationDays,
      })),
      { yearly: config.yearly, pricePoints: config.pricePoints }
    );
  } catch (error) {
    if (error instanceof CatalogError) {
      throw new ConfigError(error.message, ConfigErrorCode.VALIDATION_ERROR, [
        { message: error.message, path: ['tiers'] },
      ]);
    }
    throw error;
  }

  return {
    catalog,
    roleIds: Object.fromEntries(config.tiers.map((tier) => [tier.name, tier.roleId])),
    restrictionRoleIds: config.restrictionRoleIds,
  };
}

export function loadTierConfig(filePath: string): TierConfig {
  const absolutePath = path.resolve(filePath);

  if (!fs.existsSync(absolutePath)) {
    throw new ConfigError(`Tier configuration not found: ${filePath}`, ConfigErrorCode.FILE_NOT_FOUND);
  }

  let content: string;
  try {
    content = fs.readFileSync(absolutePath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Failed to read tier configuration: ${filePath}`, ConfigErrorCode.FILE_READ_ERROR, [
      { message: String(error), path: [] },
    ]);
  }

  return parseTierConfig(content);
}

function validateRoleReferences(config: z.infer<typeof TierConfigSchema>): ConfigErrorDetail[] {
  const errors: ConfigErrorDetail[] = [];
  const seen = new Map<string, string>();

  config.tiers.forEach((tier, index) => {
    const owner = seen.get(tier.roleId);
    if (owner) {
      errors.push({
        message: `Role ${tier.roleId} is already mapped to tier ${owner}`,
        path: ['tiers', index, 'roleId'],
      });
    }
    seen.set(tier.roleId, tier.name);
  });

  config.restrictionRoleIds.forEach((roleId, index) => {
    const owner = seen.get(roleId);
    if (owner) {
      errors.push({
        message: `Restriction role ${roleId} is also the role of tier ${owner}`,
        path: ['restrictionRoleIds', index],
      });
    }
  });

  return errors;
}
