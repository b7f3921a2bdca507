// ──────────────────────────────────────────
// Modeling: Customer model repository
// ──────────────────────────────────────────

import { Knex } from 'knex';
import { CustomerStore } from '../../../shared/contracts';
import { Customer } from '../../../shared/types';

const INSERT_CHUNK = 500;

export class CustomerModel implements CustomerStore {
  constructor(private db: Knex) {}

  async insertMany(customers: Customer[]): Promise<number> {
    if (customers.length === 0) return 0;
    await this.db.batchInsert('customers', customers, INSERT_CHUNK);
    return customers.length;
  }

  async getIds(): Promise<Set<string>> {
    const rows: Pick<Customer, 'customer_id'>[] = await this.db('customers').select('customer_id');
    return new Set(rows.map((r) => r.customer_id));
  }
}
