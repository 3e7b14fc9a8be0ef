/**
 * Resolves "all devices" and "by group" targeting into concrete device ids.
 */

import { existsSync, readFileSync } from 'fs';
import { z } from 'zod';
import logger from '../lib/logger.js';

export interface DeviceInventory {
  listAcceptedDevices(): Promise<string[]>;
  /** Unknown groups resolve to no devices */
  listGroupDevices(group: string): Promise<string[]>;
}

export const InventoryFileSchema = z.object({
  devices: z.array(z.string().min(1)).default([]),
  groups: z.record(z.array(z.string().min(1))).default({}),
});

export type InventoryFile = z.infer<typeof InventoryFileSchema>;

/**
 * In-memory inventory. Group members that are not accepted devices are ignored.
 */
export class StaticDeviceInventory implements DeviceInventory {
  private readonly accepted: string[];
  private readonly groups: Map<string, string[]>;

  constructor(inventory: Partial<InventoryFile> = {}) {
    this.accepted = [...new Set(inventory.devices ?? [])];
    this.groups = new Map(Object.entries(inventory.groups ?? {}));
  }

  async listAcceptedDevices(): Promise<string[]> {
    return [...this.accepted];
  }

  async listGroupDevices(group: string): Promise<string[]> {
    const members = this.groups.get(group) ?? [];
    return members.filter((deviceId) => this.accepted.includes(deviceId));
  }
}

/**
 * Load an inventory file. A missing file yields an empty inventory.
 */
export function loadInventoryFile(path: string): StaticDeviceInventory {
  if (!existsSync(path)) {
    logger.warn({ path }, 'Inventory file not found, starting with no devices');
    return new StaticDeviceInventory();
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (e) {
    throw new Error(`Failed to parse inventory file ${path}: ${e instanceof Error ? e.message : String(e)}`);
  }

  return new StaticDeviceInventory(InventoryFileSchema.parse(raw));
}
