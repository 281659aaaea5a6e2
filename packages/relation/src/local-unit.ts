/**
 * In-process local unit
 */

import type { RelationEndpointSpec } from '@scrapelink/shared';
import type { LocalUnitContext, RelationRecord } from './types.js';

export interface StaticLocalUnitOptions {
  model: string;
  modelUuid: string;
  application: string;
  unit: string;
  charmName: string;
  sourceDir?: string;
  endpoints?: RelationEndpointSpec[];
  leader?: boolean;
  /** Address used on every relation unless overridden per relation id */
  address?: string;
}

/**
 * A LocalUnitContext backed by plain values, paired with
 * InMemoryRelationStore when no real host is around.
 */
export class StaticLocalUnit implements LocalUnitContext {
  readonly model: string;
  readonly modelUuid: string;
  readonly application: string;
  readonly unit: string;
  readonly charmName: string;
  readonly sourceDir: string;
  readonly endpoints: readonly RelationEndpointSpec[];
  private leader: boolean;
  private readonly defaultAddress: string | undefined;
  private readonly addresses = new Map<number, string>();

  constructor(options: StaticLocalUnitOptions) {
    this.model = options.model;
    this.modelUuid = options.modelUuid;
    this.application = options.application;
    this.unit = options.unit;
    this.charmName = options.charmName;
    this.sourceDir = options.sourceDir ?? process.cwd();
    this.endpoints = options.endpoints ?? [];
    this.leader = options.leader ?? false;
    this.defaultAddress = options.address;
  }

  isLeader(): boolean {
    return this.leader;
  }

  setLeader(leader: boolean): void {
    this.leader = leader;
  }

  setAddress(relationId: number, address: string): void {
    this.addresses.set(relationId, address);
  }

  bindAddress(relation: RelationRecord): string | undefined {
    return this.addresses.get(relation.id) ?? this.defaultAddress;
  }
}
