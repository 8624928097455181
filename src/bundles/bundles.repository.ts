import { Injectable } from '@nestjs/common';
import { and, asc, eq, sql } from 'drizzle-orm';
import {
  DatabaseService,
  DatabaseTransaction,
} from '../database/database.service';
import { pgErrorCode, PG_UNIQUE_VIOLATION } from '../database/pg-errors';
import { bundleComponents, products } from '../database/schema';
import { DuplicateBundleComponentError } from './bundles.errors';
import {
  BundleComponent,
  BundleComponentDetail,
  BundleComponentInput,
} from './bundles.types';

export const BUNDLE_REPOSITORY = 'BUNDLE_REPOSITORY';

export interface BundleUnitOfWork {
  /** Serializes bundle graph writes of one company until the transaction ends. */
  lockCompanyGraph(companyId: number): Promise<void>;
  listComponentIds(bundleId: number): Promise<number[]>;
  insertComponent(input: BundleComponentInput): Promise<BundleComponent>;
}

export interface BundleRepository {
  inTransaction<T>(work: (uow: BundleUnitOfWork) => Promise<T>): Promise<T>;
  listComponents(bundleId: number): Promise<BundleComponentDetail[]>;
  removeComponent(bundleId: number, componentId: number): Promise<boolean>;
}

class DrizzleBundleUnitOfWork implements BundleUnitOfWork {
  constructor(private readonly tx: DatabaseTransaction) {}

  async lockCompanyGraph(companyId: number) {
    await this.tx.execute(
      sql`select pg_advisory_xact_lock(hashtext(${`bundle-graph:${companyId}`}))`,
    );
  }

  async listComponentIds(bundleId: number) {
    const rows = await this.tx
      .select({ componentId: bundleComponents.componentId })
      .from(bundleComponents)
      .where(eq(bundleComponents.bundleId, bundleId));
    return rows.map((row) => row.componentId);
  }

  async insertComponent(input: BundleComponentInput) {
    try {
      const [created] = await this.tx
        .insert(bundleComponents)
        .values(input)
        .returning();
      if (!created) {
        throw new Error('Bundle component insert returned no row.');
      }
      return created;
    } catch (error) {
      if (pgErrorCode(error) === PG_UNIQUE_VIOLATION) {
        throw new DuplicateBundleComponentError(
          input.bundleId,
          input.componentId,
        );
      }
      throw error;
    }
  }
}

@Injectable()
export class DrizzleBundleRepository implements BundleRepository {
  constructor(private readonly database: DatabaseService) {}

  inTransaction<T>(work: (uow: BundleUnitOfWork) => Promise<T>) {
    return this.database.db.transaction((tx) =>
      work(new DrizzleBundleUnitOfWork(tx)),
    );
  }

  async listComponents(bundleId: number) {
    return this.database.db
      .select({
        bundleId: bundleComponents.bundleId,
        componentId: bundleComponents.componentId,
        quantity: bundleComponents.quantity,
        componentSku: products.sku,
        componentName: products.name,
        componentIsBundle: products.isBundle,
      })
      .from(bundleComponents)
      .innerJoin(products, eq(bundleComponents.componentId, products.id))
      .where(eq(bundleComponents.bundleId, bundleId))
      .orderBy(asc(bundleComponents.id));
  }

  async removeComponent(bundleId: number, componentId: number) {
    const removed = await this.database.db
      .delete(bundleComponents)
      .where(
        and(
          eq(bundleComponents.bundleId, bundleId),
          eq(bundleComponents.componentId, componentId),
        ),
      )
      .returning({ id: bundleComponents.id });
    return removed.length > 0;
  }
}
