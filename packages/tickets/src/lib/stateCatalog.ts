/**
 * State Catalog: valid ticket states and name/slug/id resolution.
 */

import type { Knex } from 'knex';
import type { ITicketState } from '@deskflow/types';
import { DependencyError, ValidationError, getErrorMessage } from '@deskflow/core/errors';
import defaultLogger, { type AppLogger } from '@deskflow/core/logger';
import TicketState from '../models/status';

export type StateResolution =
  | { kind: 'resolved'; state: ITicketState }
  | { kind: 'fallback'; id: number; state: ITicketState | null; reason: ValidationError }
  | { kind: 'unknown'; reason: ValidationError };

export function slugifyStateName(name: string): string {
  return name.trim().toLowerCase().replace(/\s+/g, '_');
}

export interface StateCatalogOptions {
  knex: Knex | Knex.Transaction;
  logger?: AppLogger;
}

export class StateCatalog {
  private readonly knex: Knex | Knex.Transaction;
  private readonly logger: AppLogger;

  constructor(options: StateCatalogOptions) {
    this.knex = options.knex;
    this.logger = options.logger ?? defaultLogger;
  }

  async listStates(): Promise<ITicketState[]> {
    try {
      return await TicketState.getAllValid(this.knex);
    } catch (error) {
      throw new DependencyError('Failed to load ticket states', error);
    }
  }

  async loadState(id: number): Promise<ITicketState | undefined> {
    try {
      return await TicketState.get(this.knex, id);
    } catch (error) {
      throw new DependencyError('Failed to load ticket state', error, { stateId: id });
    }
  }

  /**
   * Accepts a state name, its slug (`pending_reminder`) or a numeric id.
   * Without a match, a positive fallback id is returned with an advisory reason;
   * otherwise the result is `unknown` and callers must reject the request.
   */
  async resolveState(nameOrSlug: string, fallbackId = 0): Promise<StateResolution> {
    const value = nameOrSlug.trim();

    if (value) {
      if (/^\d+$/.test(value)) {
        const byId = await this.loadState(Number(value));
        if (byId && byId.valid_id === 1) {
          return { kind: 'resolved', state: byId };
        }
      } else {
        const lowered = value.toLowerCase();
        const slug = slugifyStateName(value);
        const states = await this.listStates();
        const match = states.find(
          (state) => state.name.toLowerCase() === lowered || slugifyStateName(state.name) === slug
        );
        if (match) {
          return { kind: 'resolved', state: match };
        }
      }
    }

    const reason = new ValidationError('unknown status', { status: value });
    if (fallbackId > 0) {
      this.logger.warn('[StateCatalog] state not found, using fallback', { status: value, fallbackId });
      return { kind: 'fallback', id: fallbackId, state: (await this.loadState(fallbackId)) ?? null, reason };
    }
    return { kind: 'unknown', reason };
  }

  /**
   * Display name for history messages. Never throws; falls back to `state <id>`.
   */
  async stateName(id: number): Promise<string> {
    try {
      const state = await TicketState.get(this.knex, id);
      if (state) {
        return state.name;
      }
    } catch (error) {
      this.logger.warn('[StateCatalog] state name lookup failed', { stateId: id, error: getErrorMessage(error) });
    }
    return `state ${id}`;
  }
}
