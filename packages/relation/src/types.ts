/**
 * Host boundary types
 *
 * The engine never talks to a host directly. It reads and writes relation
 * data through a RelationDataStore and is driven by HostEvents delivered
 * one at a time.
 */

import type { RelationEndpointSpec } from '@scrapelink/shared';

// ===========================================
// Relation Data
// ===========================================

export interface RelationRecord {
  id: number;
  /** Endpoint name the relation was established on */
  name: string;
  /** Remote application */
  app: string;
  /** Remote units currently in the relation */
  units: readonly string[];
}

export type RelationBucket = Readonly<Record<string, string>>;

/**
 * Key/value relation data, scoped per relation to an application or unit
 * ("entity"). No transactions and no atomic multi-key writes.
 */
export interface RelationDataStore {
  relations(name: string): Promise<RelationRecord[]>;
  relation(name: string, id: number): Promise<RelationRecord | null>;
  bucket(relationId: number, entity: string): Promise<RelationBucket>;
  get(relationId: number, entity: string, key: string): Promise<string | undefined>;
  /** An empty value removes the key */
  set(relationId: number, entity: string, key: string, value: string): Promise<void>;
}

// ===========================================
// Local Unit
// ===========================================

export interface LocalUnitContext {
  model: string;
  modelUuid: string;
  application: string;
  unit: string;
  charmName: string;
  /** Directory the workload's relative paths (alert rules) resolve against */
  sourceDir: string;
  endpoints: readonly RelationEndpointSpec[];
  isLeader(): boolean;
  /** Address this unit is reachable on over the given relation */
  bindAddress(relation: RelationRecord): string | undefined;
}

// ===========================================
// Notifications
// ===========================================

export type RelationEventKind = 'joined' | 'changed' | 'departed' | 'broken';

export interface RelationEvent {
  kind: RelationEventKind;
  relationName: string;
  relationId: number;
  /** Remote application */
  app: string;
  /** Remote unit the notification is about; departed always carries it */
  unit?: string;
}

export type LifecycleEventKind = 'leader-elected' | 'upgrade' | 'workload-ready';

export interface LifecycleEvent {
  kind: LifecycleEventKind;
}

export type HostEvent = RelationEvent | LifecycleEvent;

export function isRelationEvent(event: HostEvent): event is RelationEvent {
  return 'relationName' in event;
}

/**
 * Anything the host can deliver notifications to
 */
export interface HostEventHandler {
  handle(event: HostEvent): Promise<void>;
}
