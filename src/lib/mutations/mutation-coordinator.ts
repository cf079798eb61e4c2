/**
 * MutationCoordinator - the single write path for entities and relationships.
 *
 * Every operation runs in one BEGIN IMMEDIATE transaction. Relationship
 * transitions append their RelationshipLog row inside that same transaction,
 * so a failed log write rolls the mutation back. Events go out only after
 * commit.
 *
 * A contact's accountId and its works_for relationship move together:
 * changing the employer ends the old works_for, and activating or ending a
 * works_for sets or clears the employer.
 */

import type { SQLiteDatabase } from '@/lib/db/init';
import { runImmediate } from '@/lib/db/transaction';
import {
  createEntitySchema,
  deleteEntityOptionsSchema,
  updateAccountSchema,
  updateContactSchema,
  type CreateEntityInput,
  type DeleteEntityOptions,
  type UpdateEntityInput,
} from '@/lib/entities/schemas';
import type { Account, Contact, Entity, EntityKind } from '@/lib/entities/types';
import { ConflictError, NotFoundError, ValidationError, toDashboardError } from '@/lib/errors';
import type { DashboardEvents, EntityChangedEvent, RelationshipChangedEvent } from '@/lib/events';
import {
  connectEntitiesSchema,
  createRelationshipSchema,
  relationshipActionSchema,
  updateRelationshipSchema,
  type ConnectEntitiesInput,
  type CreateRelationshipInput,
  type RelationshipActionOptions,
  type UpdateRelationshipInput,
} from '@/lib/relationships/schemas';
import { employmentLink } from '@/lib/relationships/employment';
import { TERM_CONFIG, inferTerm, resolveScore } from '@/lib/relationships/term-config';
import type { LogAction, Relationship, RelationshipLogEntry, RelationshipTerm } from '@/lib/relationships/types';
import type { AppSettings } from '@/lib/settings/types';
import type { StorageService } from '@/lib/storage/interfaces';
import type { EventBus } from '@/lib/utils/event-bus';
import { generateId } from '@/lib/utils/ids';
import { createLogger } from '@/lib/utils/logger';
import { parseInput } from '@/lib/validation';
import { diffRelationships, meaningfulChanges } from './delta-calculator';

const log = createLogger('MutationCoordinator');

export interface MutationContext {
  /** Recorded as lastModifiedBy and log actor; falls back to the configured actor */
  actor?: string;
}

export interface EntityDeletion {
  entity: Entity;
  /** Relationships soft-deleted by a cascade, each with its own log entry */
  deletedRelationships: Relationship[];
  /** Contacts whose accountId was cleared */
  detachedContacts: number;
}

export interface ConnectResult {
  action: Extract<LogAction, 'create' | 'restore'>;
  relationship: Relationship;
}

interface Outcome<T> {
  result: T;
  entityEvents: EntityChangedEvent[];
  relationshipEvents: RelationshipChangedEvent[];
}

export class MutationCoordinator {
  private db: SQLiteDatabase;

  constructor(
    private storage: StorageService,
    private events: EventBus<DashboardEvents>,
    private settings: Pick<AppSettings, 'actor'>
  ) {
    this.db = storage.db;
  }

  // ==================== ENTITIES ====================

  createEntity(input: CreateEntityInput, ctx: MutationContext = {}): Entity {
    const parsed = parseInput(createEntitySchema, input, 'entity');
    const actor = this.actorFor(ctx);

    return this.commit('createEntity', (now) => {
      const id = parsed.id ?? generateId();
      if (this.storage.entities.getById(id)) {
        throw new ConflictError(`Entity ${id} already exists`, { id });
      }
      this.assertNameAvailable(parsed.kind, parsed.name, null);
      this.assertExternalIdAvailable(parsed.kind, parsed.externalId ?? null, null);

      let entity: Entity;
      if (parsed.kind === 'account') {
        const account: Account = {
          kind: 'account',
          id,
          name: parsed.name,
          ticker: parsed.ticker ?? null,
          externalId: parsed.externalId ?? null,
          createdAt: now,
          updatedAt: now,
          lastModifiedBy: actor,
          deletedAt: null,
        };
        this.storage.entities.insertAccount(account);
        entity = account;
      } else {
        const accountId = parsed.accountId ?? null;
        this.assertEmployerExists(accountId);
        const contact: Contact = {
          kind: 'contact',
          id,
          name: parsed.name,
          jobTitle: parsed.jobTitle ?? null,
          accountId,
          externalId: parsed.externalId ?? null,
          createdAt: now,
          updatedAt: now,
          lastModifiedBy: actor,
          deletedAt: null,
        };
        this.storage.entities.insertContact(contact);
        entity = contact;
      }

      log.info(`Created ${entity.kind} ${entity.id} (${entity.name})`);
      return { result: entity, entityEvents: [{ action: 'create', entity, actor }], relationshipEvents: [] };
    });
  }

  /** Moving a contact to another employer (or none) soft-deletes its old works_for */
  updateEntity(id: string, input: UpdateEntityInput, ctx: MutationContext = {}): Entity {
    const actor = this.actorFor(ctx);

    return this.commit('updateEntity', (now) => {
      const current = this.requireActiveEntity(id);
      const relationshipEvents: RelationshipChangedEvent[] = [];
      let entity: Entity;

      if (current.kind === 'account') {
        const patch = parseInput(updateAccountSchema, input, 'account update');
        const next: Account = {
          ...current,
          name: patch.name ?? current.name,
          ticker: patch.ticker === undefined ? current.ticker : patch.ticker,
          externalId: patch.externalId === undefined ? current.externalId : patch.externalId,
          updatedAt: now,
          lastModifiedBy: actor,
        };
        this.assertNameAvailable('account', next.name, id);
        this.assertExternalIdAvailable('account', next.externalId, id);
        this.storage.entities.updateAccount(next);
        entity = next;
      } else {
        const patch = parseInput(updateContactSchema, input, 'contact update');
        const next: Contact = {
          ...current,
          name: patch.name ?? current.name,
          jobTitle: patch.jobTitle === undefined ? current.jobTitle : patch.jobTitle,
          accountId: patch.accountId === undefined ? current.accountId : patch.accountId,
          externalId: patch.externalId === undefined ? current.externalId : patch.externalId,
          updatedAt: now,
          lastModifiedBy: actor,
        };
        this.assertNameAvailable('contact', next.name, id);
        this.assertExternalIdAvailable('contact', next.externalId, id);
        if (next.accountId !== current.accountId) {
          this.assertEmployerExists(next.accountId);
        }
        this.storage.entities.updateContact(next);
        entity = next;

        if (current.accountId !== null && next.accountId !== current.accountId) {
          relationshipEvents.push(...this.endEmployment(current.id, current.accountId, actor, now));
        }
      }

      return { result: entity, entityEvents: [{ action: 'update', entity, actor }], relationshipEvents };
    });
  }

  /**
   * Soft-deletes an entity. Active relationships block the delete unless
   * `cascade` is set, in which case each one is soft-deleted and logged.
   */
  deleteEntity(id: string, options: DeleteEntityOptions = {}, ctx: MutationContext = {}): EntityDeletion {
    const { cascade } = parseInput(deleteEntityOptionsSchema, options, 'delete options');
    const actor = this.actorFor(ctx);

    return this.commit('deleteEntity', (now) => {
      const current = this.requireActiveEntity(id);
      const active = this.storage.relationships.getActiveByEntity(id);

      if (active.length > 0 && !cascade) {
        throw new ConflictError(
          `${current.name} has ${active.length} active relationship(s); delete them first or cascade`,
          { id, relationshipIds: active.map((rel) => rel.id) }
        );
      }

      const relationshipEvents: RelationshipChangedEvent[] = [];
      const cascadeNote = `Cascade delete of ${current.kind} ${id}`;
      for (const rel of active) {
        relationshipEvents.push(
          this.writeTransition('delete', rel, this.softDeleted(rel, now, actor), actor, now, cascadeNote)
        );
      }

      const detachedContacts =
        current.kind === 'account' ? this.storage.entities.detachContacts(id, actor, now) : 0;

      const entity: Entity = { ...current, deletedAt: now, updatedAt: now, lastModifiedBy: actor };
      if (entity.kind === 'account') {
        this.storage.entities.updateAccount(entity);
      } else {
        this.storage.entities.updateContact(entity);
      }

      log.info(`Deleted ${entity.kind} ${id} (cascaded ${active.length}, detached ${detachedContacts})`);
      return {
        result: {
          entity,
          deletedRelationships: relationshipEvents.map((event) => event.relationship),
          detachedContacts,
        },
        entityEvents: [{ action: 'delete', entity, actor }],
        relationshipEvents,
      };
    });
  }

  // ==================== RELATIONSHIPS ====================

  createRelationship(input: CreateRelationshipInput, ctx: MutationContext = {}): Relationship {
    const parsed = parseInput(createRelationshipSchema, input, 'relationship');
    const actor = this.actorFor(ctx);

    return this.commit('createRelationship', (now) => {
      const event = this.insertRelationship(
        parsed.sourceId,
        parsed.targetId,
        parsed.term,
        parsed.score,
        actor,
        now,
        parsed.note
      );
      return {
        result: event.relationship,
        entityEvents: this.syncEmployer(null, event.relationship, actor, now),
        relationshipEvents: [event],
      };
    });
  }

  /**
   * Changing the term without a score applies the new term's default score;
   * an explicit null score resets to the default as well.
   */
  updateRelationship(id: string, input: UpdateRelationshipInput, ctx: MutationContext = {}): Relationship {
    const patch = parseInput(updateRelationshipSchema, input, 'relationship update');
    const actor = this.actorFor(ctx);

    return this.commit('updateRelationship', (now) => {
      const current = this.requireRelationship(id);
      if (current.deleted) {
        throw new ValidationError(`Relationship ${id} is deleted; restore it before updating`, { id });
      }
      if (patch.expectedVersion !== undefined && patch.expectedVersion !== current.version) {
        throw new ConflictError(`Relationship ${id} was modified concurrently`, {
          id,
          expectedVersion: patch.expectedVersion,
          actualVersion: current.version,
        });
      }

      const term = patch.term ?? current.term;
      let score = current.score;
      if (patch.score !== undefined || term !== current.term) {
        score = resolveScore(term, patch.score);
      }

      const config = TERM_CONFIG[term];
      const next: Relationship = {
        ...current,
        term,
        category: config.category,
        directed: config.directed,
        score,
        version: current.version + 1,
        updatedAt: now,
        lastModifiedBy: actor,
      };

      const event = this.writeTransition('update', current, next, actor, now, patch.note);
      if (meaningfulChanges(event.logEntry.changes).length === 0) {
        log.debug(`Relationship ${id} updated without field changes`);
      }
      return { result: next, entityEvents: this.syncEmployer(current, next, actor, now), relationshipEvents: [event] };
    });
  }

  deleteRelationship(id: string, options: RelationshipActionOptions = {}, ctx: MutationContext = {}): Relationship {
    const { note } = parseInput(relationshipActionSchema, options, 'delete options');
    const actor = this.actorFor(ctx);

    return this.commit('deleteRelationship', (now) => {
      const current = this.requireRelationship(id);
      if (current.deleted) {
        throw new ConflictError(`Relationship ${id} is already deleted`, { id });
      }
      const event = this.writeTransition('delete', current, this.softDeleted(current, now, actor), actor, now, note);
      return {
        result: event.relationship,
        entityEvents: this.syncEmployer(current, event.relationship, actor, now),
        relationshipEvents: [event],
      };
    });
  }

  restoreRelationship(id: string, options: RelationshipActionOptions = {}, ctx: MutationContext = {}): Relationship {
    const { note } = parseInput(relationshipActionSchema, options, 'restore options');
    const actor = this.actorFor(ctx);

    return this.commit('restoreRelationship', (now) => {
      const current = this.requireRelationship(id);
      if (!current.deleted) {
        throw new ConflictError(`Relationship ${id} is not deleted`, { id });
      }
      const event = this.restore(current, actor, now, note);
      return {
        result: event.relationship,
        entityEvents: this.syncEmployer(current, event.relationship, actor, now),
        relationshipEvents: [event],
      };
    });
  }

  /**
   * Links two entities without naming a term: brings back a deleted
   * relationship for the same ordered pair, or creates one with the term
   * inferred from the endpoint kinds.
   */
  connectEntities(input: ConnectEntitiesInput, ctx: MutationContext = {}): ConnectResult {
    const parsed = parseInput(connectEntitiesSchema, input, 'connection');
    const actor = this.actorFor(ctx);

    return this.commit<ConnectResult>('connectEntities', (now) => {
      this.assertNotSelfLink(parsed.sourceId, parsed.targetId);
      const source = this.requireActiveEntity(parsed.sourceId);
      const target = this.requireActiveEntity(parsed.targetId);

      const previous = this.storage.relationships.findDeletedBetween(source.id, target.id);
      if (previous) {
        const event = this.restore(previous, actor, now, parsed.note);
        return {
          result: { action: 'restore', relationship: event.relationship },
          entityEvents: this.syncEmployer(previous, event.relationship, actor, now),
          relationshipEvents: [event],
        };
      }

      const term = inferTerm(source.kind, target.kind);
      const event = this.insertRelationship(source.id, target.id, term, undefined, actor, now, parsed.note);
      return {
        result: { action: 'create', relationship: event.relationship },
        entityEvents: this.syncEmployer(null, event.relationship, actor, now),
        relationshipEvents: [event],
      };
    });
  }

  // ==================== INTERNALS ====================

  private commit<T>(operation: string, fn: (now: number) => Outcome<T>): T {
    let outcome: Outcome<T>;
    try {
      outcome = runImmediate(this.db, () => fn(Date.now()));
    } catch (err) {
      const error = toDashboardError(err, operation);
      if (error.code === 'INTERNAL') {
        log.error(`${operation} rolled back:`, err);
      }
      throw error;
    }

    for (const event of outcome.entityEvents) {
      this.events.emit('entity:changed', event);
    }
    for (const event of outcome.relationshipEvents) {
      this.events.emit('relationship:changed', event);
    }
    return outcome.result;
  }

  private insertRelationship(
    sourceId: string,
    targetId: string,
    term: RelationshipTerm,
    requestedScore: number | null | undefined,
    actor: string,
    now: number,
    note: string | undefined
  ): RelationshipChangedEvent {
    this.assertNotSelfLink(sourceId, targetId);
    const source = this.requireActiveEntity(sourceId);
    const target = this.requireActiveEntity(targetId);
    const score = resolveScore(term, requestedScore);
    this.assertPairFree(source.id, target.id);

    const config = TERM_CONFIG[term];
    const rel: Relationship = {
      id: generateId(),
      sourceId: source.id,
      sourceKind: source.kind,
      targetId: target.id,
      targetKind: target.kind,
      term,
      category: config.category,
      directed: config.directed,
      score,
      version: 1,
      createdAt: now,
      updatedAt: now,
      deleted: false,
      deletedAt: null,
      lastModifiedBy: actor,
    };

    this.storage.relationships.insert(rel);
    const logEntry = this.recordTransition('create', null, rel, actor, now, note);
    return { action: 'create', relationship: rel, logEntry };
  }

  private restore(current: Relationship, actor: string, now: number, note: string | undefined): RelationshipChangedEvent {
    this.requireActiveEntity(current.sourceId);
    this.requireActiveEntity(current.targetId);
    this.assertPairFree(current.sourceId, current.targetId);

    const next: Relationship = {
      ...current,
      deleted: false,
      deletedAt: null,
      version: current.version + 1,
      updatedAt: now,
      lastModifiedBy: actor,
    };
    return this.writeTransition('restore', current, next, actor, now, note);
  }

  private softDeleted(current: Relationship, now: number, actor: string): Relationship {
    return {
      ...current,
      deleted: true,
      deletedAt: now,
      version: current.version + 1,
      updatedAt: now,
      lastModifiedBy: actor,
    };
  }

  /** Writes `next` guarded by the current version and logs the transition */
  private writeTransition(
    action: LogAction,
    current: Relationship,
    next: Relationship,
    actor: string,
    now: number,
    note: string | undefined
  ): RelationshipChangedEvent {
    if (!this.storage.relationships.update(next, current.version)) {
      throw new ConflictError(`Relationship ${current.id} was modified concurrently`, {
        id: current.id,
        expectedVersion: current.version,
      });
    }
    const logEntry = this.recordTransition(action, current, next, actor, now, note);
    return { action, relationship: next, logEntry };
  }

  private recordTransition(
    action: LogAction,
    previous: Relationship | null,
    next: Relationship,
    actor: string,
    now: number,
    note: string | undefined
  ): RelationshipLogEntry {
    const entry = this.storage.auditLog.append({
      id: generateId(),
      relationshipId: next.id,
      action,
      previousState: previous,
      newState: next,
      changes: diffRelationships(previous, next),
      changedAt: now,
      actor,
      note: note ?? null,
    });
    log.debug(`${action} ${next.id} logged as #${entry.sequence}`);
    return entry;
  }

  /**
   * Sets the contact's employer when a works_for becomes active and clears
   * it when one ends. A contact already employed elsewhere is a Conflict.
   */
  private syncEmployer(
    previous: Relationship | null,
    next: Relationship,
    actor: string,
    now: number
  ): EntityChangedEvent[] {
    const before = previous && !previous.deleted ? employmentLink(previous) : null;
    const after = next.deleted ? null : employmentLink(next);

    if (after && !before) {
      const contact = this.requireContact(after.contactId);
      if (contact.accountId === after.accountId) return [];
      if (contact.accountId !== null) {
        throw new ConflictError(
          `${contact.name} already works for account ${contact.accountId}; change the contact's accountId first`,
          { contactId: contact.id, accountId: contact.accountId }
        );
      }
      return [this.setEmployer(contact, after.accountId, actor, now)];
    }

    if (before && !after) {
      const contact = this.requireContact(before.contactId);
      if (contact.accountId !== before.accountId) return [];
      return [this.setEmployer(contact, null, actor, now)];
    }

    return [];
  }

  private setEmployer(contact: Contact, accountId: string | null, actor: string, now: number): EntityChangedEvent {
    const entity: Contact = { ...contact, accountId, updatedAt: now, lastModifiedBy: actor };
    this.storage.entities.updateContact(entity);
    log.debug(`Employer of ${contact.id} set to ${accountId ?? 'none'}`);
    return { action: 'update', entity, actor };
  }

  private endEmployment(contactId: string, accountId: string, actor: string, now: number): RelationshipChangedEvent[] {
    const rel = this.storage.relationships.findActiveBetween(contactId, accountId);
    if (!rel || employmentLink(rel) === null) return [];
    return [this.writeTransition('delete', rel, this.softDeleted(rel, now, actor), actor, now, 'Employer changed')];
  }

  private actorFor(ctx: MutationContext): string {
    const actor = ctx.actor?.trim();
    return actor ? actor : this.settings.actor;
  }

  private requireActiveEntity(id: string): Entity {
    const entity = this.storage.entities.getById(id);
    if (!entity || entity.deletedAt !== null) {
      throw new NotFoundError(`Entity ${id} not found`, { id });
    }
    return entity;
  }

  private requireContact(id: string): Contact {
    const entity = this.requireActiveEntity(id);
    if (entity.kind !== 'contact') {
      throw new ValidationError(`Entity ${id} is not a contact`, { id });
    }
    return entity;
  }

  private requireRelationship(id: string): Relationship {
    const rel = this.storage.relationships.getById(id);
    if (!rel) {
      throw new NotFoundError(`Relationship ${id} not found`, { id });
    }
    return rel;
  }

  private assertNotSelfLink(sourceId: string, targetId: string): void {
    if (sourceId === targetId) {
      throw new ValidationError('A relationship cannot connect an entity to itself', { sourceId, targetId });
    }
  }

  private assertPairFree(sourceId: string, targetId: string): void {
    const existing = this.storage.relationships.findActiveBetween(sourceId, targetId);
    if (existing) {
      throw new ConflictError('An active relationship already connects these entities', {
        relationshipId: existing.id,
      });
    }
  }

  private assertNameAvailable(kind: EntityKind, name: string, selfId: string | null): void {
    const existing = this.storage.entities.findActiveByName(kind, name);
    if (existing && existing.id !== selfId) {
      throw new ConflictError(`An active ${kind} named "${existing.name}" already exists`, {
        field: 'name',
        existingId: existing.id,
      });
    }
  }

  private assertExternalIdAvailable(kind: EntityKind, externalId: string | null, selfId: string | null): void {
    if (externalId === null) return;
    const existing = this.storage.entities.findActiveByExternalId(kind, externalId);
    if (existing && existing.id !== selfId) {
      throw new ValidationError(`External id "${externalId}" is already used by another ${kind}`, {
        field: 'externalId',
        existingId: existing.id,
      });
    }
  }

  private assertEmployerExists(accountId: string | null): void {
    if (accountId === null) return;
    const account = this.storage.entities.getById(accountId);
    if (!account || account.kind !== 'account' || account.deletedAt !== null) {
      throw new ValidationError(`accountId ${accountId} does not reference an active account`, {
        field: 'accountId',
      });
    }
  }
}
