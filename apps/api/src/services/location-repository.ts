import { ConditionalCheckFailedException } from '@aws-sdk/client-dynamodb';
import { QueryCommand, GetCommand, UpdateCommand } from '@aws-sdk/lib-dynamodb';
import {
  LocationNotFoundError,
  LocationSchema,
  hasCoordinates,
  type Location,
} from '@geofence/shared';
import { docClient, TABLE_NAME } from '../db.js';
import { logger } from '../lib/logger.js';

const LIVE_CONDITION = '(attribute_not_exists(deletedAt) OR attribute_type(deletedAt, :nullType))';

export const productKey = (product: string): string => `PRODUCT#${product}`;
export const locationKey = (locationCode: string): string => `LOCATION#${locationCode}`;

/**
 * Yield the product's active, live locations that have coordinates, one page at a time.
 *
 * Items are keyed PK = PRODUCT#<product>, SK = LOCATION#<code>. The filter runs
 * server-side; rows that fail schema validation are logged and skipped.
 */
export async function* streamCandidatesWithCoordinates(
  product: string,
  signal?: AbortSignal,
): AsyncGenerator<Location> {
  let exclusiveStartKey: Record<string, unknown> | undefined;

  do {
    signal?.throwIfAborted();

    const result = await docClient.send(
      new QueryCommand({
        TableName: TABLE_NAME,
        KeyConditionExpression: 'PK = :pk AND begins_with(SK, :sk)',
        FilterExpression: [
          'isActive = :active',
          LIVE_CONDITION,
          'attribute_type(latitude, :numberType)',
          'attribute_type(longitude, :numberType)',
        ].join(' AND '),
        ExpressionAttributeValues: {
          ':pk': productKey(product),
          ':sk': 'LOCATION#',
          ':active': true,
          ':nullType': 'NULL',
          ':numberType': 'N',
        },
        ExclusiveStartKey: exclusiveStartKey,
      }),
    );

    for (const item of result.Items ?? []) {
      const parsed = LocationSchema.safeParse(item);
      if (!parsed.success) {
        logger.warn(
          { product, sk: item.SK, issues: parsed.error.issues },
          'Skipping malformed location item',
        );
        continue;
      }
      yield parsed.data;
    }

    exclusiveStartKey = result.LastEvaluatedKey;
  } while (exclusiveStartKey);
}

/**
 * Fetch one location by code. Missing and soft-deleted locations both read as null.
 */
export async function getLocationByCode(
  product: string,
  locationCode: string,
): Promise<Location | null> {
  const result = await docClient.send(
    new GetCommand({
      TableName: TABLE_NAME,
      Key: { PK: productKey(product), SK: locationKey(locationCode) },
    }),
  );

  if (!result.Item) return null;

  const location = LocationSchema.parse(result.Item);
  return location.deletedAt === null ? location : null;
}

/**
 * Persist the coordinate fields of `location` in one conditional update.
 * Null fields are removed so that a half-written tuple never exists in the table.
 */
export async function saveCoordinates(location: Location): Promise<Location> {
  const values: Record<string, unknown> = {
    ':updatedAt': location.updatedAt,
    ':nullType': 'NULL',
  };
  const set = ['updatedAt = :updatedAt'];
  const remove: string[] = [];

  if (hasCoordinates(location)) {
    set.push('latitude = :latitude', 'longitude = :longitude');
    values[':latitude'] = location.latitude;
    values[':longitude'] = location.longitude;

    if (location.geofenceRadius !== null) {
      set.push('geofenceRadius = :geofenceRadius');
      values[':geofenceRadius'] = location.geofenceRadius;
    } else {
      remove.push('geofenceRadius');
    }
  } else {
    remove.push('latitude', 'longitude', 'geofenceRadius');
  }

  const updateExpression =
    `SET ${set.join(', ')}` + (remove.length > 0 ? ` REMOVE ${remove.join(', ')}` : '');

  try {
    const result = await docClient.send(
      new UpdateCommand({
        TableName: TABLE_NAME,
        Key: { PK: productKey(location.product), SK: locationKey(location.locationCode) },
        UpdateExpression: updateExpression,
        ConditionExpression: `attribute_exists(PK) AND ${LIVE_CONDITION}`,
        ExpressionAttributeValues: values,
        ReturnValues: 'ALL_NEW',
      }),
    );
    return LocationSchema.parse(result.Attributes);
  } catch (err) {
    if (err instanceof ConditionalCheckFailedException) {
      throw new LocationNotFoundError(location.locationCode);
    }
    throw err;
  }
}
