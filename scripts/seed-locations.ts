#!/usr/bin/env npx tsx
/**
 * Seed script for locations.
 * Reads data/locations-seed.json, validates each entry against LocationSchema
 * and writes it to DynamoDB with BatchWriteItem.
 *
 * Idempotent: PutRequest overwrites items with the same key.
 *
 * Usage: npx tsx scripts/seed-locations.ts [--table-name <name>]
 */
import { readFileSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import {
  DynamoDBDocumentClient,
  BatchWriteCommand,
  type BatchWriteCommandInput,
} from '@aws-sdk/lib-dynamodb';
import { LocationSchema, roundCoordinate, type Location } from '@geofence/shared';

const __dirname = dirname(fileURLToPath(import.meta.url));

const BATCH_SIZE = 25;

// Null fields are left out of the item; the API reads a missing attribute as null.
function toItem(location: Location): Record<string, unknown> {
  const item: Record<string, unknown> = {
    PK: `PRODUCT#${location.product}`,
    SK: `LOCATION#${location.locationCode}`,
    ...location,
    latitude: location.latitude === null ? null : roundCoordinate(location.latitude),
    longitude: location.longitude === null ? null : roundCoordinate(location.longitude),
  };
  return Object.fromEntries(Object.entries(item).filter(([, value]) => value !== null));
}

async function main(): Promise<void> {
  const tableNameArg = process.argv.indexOf('--table-name');
  const tableName =
    tableNameArg !== -1
      ? process.argv[tableNameArg + 1]
      : (process.env.TABLE_NAME ?? 'GeofenceLocations-dev');

  if (!tableName) {
    console.error('Usage: npx tsx scripts/seed-locations.ts [--table-name <name>]');
    process.exit(1);
  }

  const seedPath = resolve(__dirname, '..', 'data', 'locations-seed.json');
  const rawData: unknown = JSON.parse(readFileSync(seedPath, 'utf-8'));

  if (!Array.isArray(rawData)) {
    console.error('Seed data must be an array');
    process.exit(1);
  }

  const locations: Location[] = [];
  for (let i = 0; i < rawData.length; i++) {
    const result = LocationSchema.safeParse(rawData[i]);
    if (!result.success) {
      console.error(`Validation failed for location at index ${i}:`, result.error.issues);
      process.exit(1);
    }
    locations.push(result.data);
  }

  console.log(`Validated ${locations.length} locations`);

  const items = locations.map(toItem);
  console.log(`Writing ${items.length} items to table "${tableName}"`);

  const client = new DynamoDBClient({});
  const docClient = DynamoDBDocumentClient.from(client);

  for (let i = 0; i < items.length; i += BATCH_SIZE) {
    const batch = items.slice(i, i + BATCH_SIZE);
    const params: BatchWriteCommandInput = {
      RequestItems: {
        [tableName]: batch.map((item) => ({
          PutRequest: { Item: item },
        })),
      },
    };

    await docClient.send(new BatchWriteCommand(params));
    console.log(`  Wrote batch ${Math.floor(i / BATCH_SIZE) + 1} (${batch.length} items)`);
  }

  console.log('Seed complete');
}

main().catch((err: unknown) => {
  console.error('Seed failed:', err);
  process.exit(1);
});
