import { bytesToHex } from '@noble/hashes/utils';
import type { OracleEvent, PricePoint, RegistryEntry } from '@epo/types';
import { pcrsToHex } from '@epo/registry';

// u64 values leave the host as decimal strings

export function entryToJson(entry: RegistryEntry) {
  return {
    publicKey: bytesToHex(entry.publicKey),
    pcrs: pcrsToHex(entry.pcrs),
    registeredAt: new Date(entry.registeredAt).toISOString(),
  };
}

export function pricePointToJson(point: PricePoint) {
  return {
    price: point.price.toString(),
    timestampMs: point.timestampMs.toString(),
  };
}

export function eventToJson(event: OracleEvent) {
  if (event.type === 'price-updated') {
    return {
      ...event,
      price: event.price.toString(),
      timestampMs: event.timestampMs.toString(),
    };
  }
  return event;
}
