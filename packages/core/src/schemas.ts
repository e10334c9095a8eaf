/**
 * Response Schemas
 *
 * zod schemas for the JSON the recorder exchanges. Objects pass unknown
 * fields through so settings read from the device can be sent back intact.
 *
 * @module core/schemas
 */

import { z } from 'zod';
import type {
  ChannelSetup,
  ModuleInfo,
  RecorderSetup,
  RecordingEntry,
  TransducerSetup,
} from './types';

export const transducerSetupSchema: z.ZodType<TransducerSetup, z.ZodTypeDef, unknown> = z
  .object({
    sensitivity: z.number(),
    unit: z.string(),
    serialNumber: z.string(),
    type: z.object({ number: z.string() }).passthrough(),
  })
  .passthrough();

export const channelSetupSchema: z.ZodType<ChannelSetup, z.ZodTypeDef, unknown> = z
  .object({
    enabled: z.boolean(),
    name: z.string(),
    bandwidth: z.string(),
    filter: z.string(),
    range: z.string(),
    ccld: z.boolean(),
    transducer: transducerSetupSchema,
  })
  .passthrough();

const recorderSetupShape = {
  name: z.string(),
  channels: z.array(channelSetupSchema),
};

export const recorderSetupSchema: z.ZodType<RecorderSetup, z.ZodTypeDef, unknown> = z
  .object(recorderSetupShape)
  .passthrough();

export const recordingEntrySchema: z.ZodType<RecordingEntry, z.ZodTypeDef, unknown> = z
  .object({
    uri: z.string().min(1),
    size: z.number(),
    duration: z.number(),
    setup: z.object({ ...recorderSetupShape, datetime: z.number() }).passthrough(),
  })
  .passthrough();

export const recordingListSchema = z.array(recordingEntrySchema);

export const moduleInfoSchema: z.ZodType<ModuleInfo, z.ZodTypeDef, unknown> = z
  .object({
    numberOfInputChannels: z.number().int().positive(),
    sdCardInserted: z.boolean().optional(),
    supportedFilters: z.array(z.string()).optional(),
    supportedSampleRates: z.array(z.union([z.number(), z.string()])).optional(),
    supportedRanges: z.array(z.string()).optional(),
  })
  .passthrough();

export const moduleStatusSchema = z
  .object({
    moduleState: z.string(),
    lastUpdateTag: z.number(),
  })
  .passthrough();

export const transducerListSchema = z.array(z.unknown());
