/**
 * In-process relation data store
 *
 * Stands in for the host's relation-data transport when the engine runs
 * outside a real host, and in tests.
 */

import { createChildLogger } from '@scrapelink/shared';
import type { RelationBucket, RelationDataStore, RelationRecord } from './types.js';

interface StoredRelation {
  id: number;
  name: string;
  app: string;
  units: string[];
  // entity (application or unit name) -> key -> value
  data: Map<string, Map<string, string>>;
}

export class InMemoryRelationStore implements RelationDataStore {
  private readonly store = new Map<number, StoredRelation>();
  private nextId = 0;
  private logger = createChildLogger({ component: 'InMemoryRelationStore' });

  async relations(name: string): Promise<RelationRecord[]> {
    return [...this.store.values()]
      .filter((relation) => relation.name === name)
      .map((relation) => this.toRecord(relation));
  }

  async relation(name: string, id: number): Promise<RelationRecord | null> {
    const relation = this.store.get(id);
    if (!relation || relation.name !== name) {
      return null;
    }
    return this.toRecord(relation);
  }

  async bucket(relationId: number, entity: string): Promise<RelationBucket> {
    const data = this.store.get(relationId)?.data.get(entity);
    return data ? Object.fromEntries(data) : {};
  }

  async get(relationId: number, entity: string, key: string): Promise<string | undefined> {
    return this.store.get(relationId)?.data.get(entity)?.get(key);
  }

  async set(relationId: number, entity: string, key: string, value: string): Promise<void> {
    const relation = this.requireRelation(relationId);
    let data = relation.data.get(entity);
    if (!data) {
      data = new Map();
      relation.data.set(entity, data);
    }

    if (value === '') {
      data.delete(key);
    } else {
      data.set(key, value);
    }
  }

  // ===========================================
  // Host-side mutations
  // ===========================================

  /**
   * Establish a relation on endpoint `name` with remote application `app`
   */
  addRelation(name: string, app: string, units: string[] = []): RelationRecord {
    const relation: StoredRelation = {
      id: this.nextId++,
      name,
      app,
      units: [...units],
      data: new Map(),
    };
    this.store.set(relation.id, relation);
    this.logger.debug({ relationId: relation.id, relationName: name, app }, 'Relation added');
    return this.toRecord(relation);
  }

  addUnit(relationId: number, unit: string): void {
    const relation = this.requireRelation(relationId);
    if (!relation.units.includes(unit)) {
      relation.units.push(unit);
    }
  }

  /**
   * Take a remote unit out of the relation. Its unit data goes with it.
   */
  removeUnit(relationId: number, unit: string): void {
    const relation = this.requireRelation(relationId);
    relation.units = relation.units.filter((name) => name !== unit);
    relation.data.delete(unit);
  }

  removeRelation(relationId: number): void {
    this.store.delete(relationId);
  }

  private requireRelation(relationId: number): StoredRelation {
    const relation = this.store.get(relationId);
    if (!relation) {
      throw new Error(`Relation ${relationId} does not exist`);
    }
    return relation;
  }

  private toRecord(relation: StoredRelation): RelationRecord {
    return {
      id: relation.id,
      name: relation.name,
      app: relation.app,
      units: [...relation.units],
    };
  }
}
