// ============================================================================
// TsuryPhone Bridge - Device Payload Schemas
// zod schemas for every JSON document the device serves. All object
// schemas pass unknown keys through: the firmware adds fields over time
// and the snapshot keeps whatever it is sent. Only the top level must be
// an object; a known field with a bad value reads as undefined.
// ============================================================================

import { z } from 'zod';

/** A typed field that never fails its document; a value that does not fit reads as undefined */
function lenient<T extends z.ZodTypeAny>(schema: T) {
  return schema.optional().catch(undefined);
}

const idSchema = z.union([z.number(), z.string()]);

// --- Status ---

const callSchema = z
  .object({
    active: lenient(z.boolean()),
    number: lenient(z.string()),
    id: lenient(idSchema),
    has_waiting: lenient(z.boolean()),
    waiting_id: lenient(idSchema),
  })
  .passthrough();

const wifiSchema = z
  .object({
    connected: lenient(z.boolean()),
    ip: lenient(z.string()),
    ssid: lenient(z.string()),
    rssi: lenient(z.number()),
  })
  .passthrough();

/** `GET /status`, and every frame pushed over the WebSocket */
export const statusSchema = z
  .object({
    state: lenient(z.string()),
    previous_state: lenient(z.string()),
    uptime: lenient(z.number()),
    free_heap: lenient(z.number()),
    maintenance: lenient(z.boolean()),
    call: lenient(callSchema),
    wifi: lenient(wifiSchema),
  })
  .passthrough();

// --- Stats ---

/** `GET /stats`: cumulative counters and hardware facts */
export const statsSchema = z
  .object({
    total_calls: lenient(z.number()),
    total_incoming_calls: lenient(z.number()),
    total_outgoing_calls: lenient(z.number()),
    total_blocked_calls: lenient(z.number()),
    total_resets: lenient(z.number()),
    cpu_freq: lenient(z.number()),
    flash_size: lenient(z.number()),
    sketch_size: lenient(z.number()),
  })
  .passthrough();

// --- On-demand categories ---

const phonebookEntrySchema = z.object({ name: z.string(), number: z.string() }).passthrough();

export const phonebookSchema = z
  .object({ entries: lenient(z.array(phonebookEntrySchema)) })
  .passthrough();

export const blockedSchema = z
  .object({ blocked_numbers: lenient(z.array(z.string())) })
  .passthrough();

export const dndSchema = z
  .object({
    force_enabled: lenient(z.boolean()),
    schedule_enabled: lenient(z.boolean()),
    start_hour: lenient(z.number()),
    start_minute: lenient(z.number()),
    end_hour: lenient(z.number()),
    end_minute: lenient(z.number()),
  })
  .passthrough();

const webhookEntrySchema = z.object({ number: z.string(), webhook_id: z.string() }).passthrough();

export const webhooksSchema = z
  .object({ webhooks: lenient(z.array(webhookEntrySchema)) })
  .passthrough();

/** `GET /`, used to confirm the host really is a TsuryPhone */
export const deviceInfoSchema = z.object({ device: z.string() }).passthrough();

// --- Derived types ---

export type DeviceStatus = z.infer<typeof statusSchema>;
export type DeviceStats = z.infer<typeof statsSchema>;
export type PhonebookData = z.infer<typeof phonebookSchema>;
export type BlockedData = z.infer<typeof blockedSchema>;
export type DndData = z.infer<typeof dndSchema>;
export type WebhooksData = z.infer<typeof webhooksSchema>;
export type DeviceInfo = z.infer<typeof deviceInfoSchema>;

/** Top-level snapshot sections, one per read endpoint */
export type Category = 'status' | 'stats' | 'phonebook' | 'blocked' | 'dnd' | 'webhooks';

/** Categories fetched lazily on first read rather than on the poll timer */
export type OnDemandCategory = Exclude<Category, 'status' | 'stats'>;

export interface CategoryData {
  status: DeviceStatus;
  stats: DeviceStats;
  phonebook: PhonebookData;
  blocked: BlockedData;
  dnd: DndData;
  webhooks: WebhooksData;
}

/** Last-known device state; a category is absent until first loaded */
export type Snapshot = { [C in Category]?: CategoryData[C] };

export const CATEGORY_SCHEMAS: { [C in Category]: z.ZodType<CategoryData[C], z.ZodTypeDef, unknown> } = {
  status: statusSchema,
  stats: statsSchema,
  phonebook: phonebookSchema,
  blocked: blockedSchema,
  dnd: dndSchema,
  webhooks: webhooksSchema,
};

/** Read endpoint for each category */
export const CATEGORY_ENDPOINTS: Record<Category, string> = {
  status: '/status',
  stats: '/stats',
  phonebook: '/phonebook',
  blocked: '/blocked',
  dnd: '/dnd',
  webhooks: '/webhooks',
};

export const ON_DEMAND_CATEGORIES: readonly OnDemandCategory[] = ['phonebook', 'blocked', 'dnd', 'webhooks'];

/** What an on-demand read returns when the device cannot be reached */
export const CATEGORY_DEFAULTS: { [C in OnDemandCategory]: () => CategoryData[C] } = {
  phonebook: () => ({ entries: [] }),
  blocked: () => ({ blocked_numbers: [] }),
  dnd: () => ({ force_enabled: false, schedule_enabled: false }),
  webhooks: () => ({ webhooks: [] }),
};
