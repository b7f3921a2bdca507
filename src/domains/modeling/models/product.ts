// ──────────────────────────────────────────
// Modeling: Product model repository
// ──────────────────────────────────────────

import { Knex } from 'knex';
import { ProductStore } from '../../../shared/contracts';
import { Product } from '../../../shared/types';

const INSERT_CHUNK = 500;

interface ProductRow extends Omit<Product, 'unit_price'> {
  unit_price: number | string;
}

export class ProductModel implements ProductStore {
  constructor(private db: Knex) {}

  async insertMany(products: Product[]): Promise<number> {
    if (products.length === 0) return 0;
    await this.db.batchInsert('products', products, INSERT_CHUNK);
    return products.length;
  }

  async getIds(): Promise<Set<string>> {
    const rows: Pick<Product, 'product_id'>[] = await this.db('products').select('product_id');
    return new Set(rows.map((r) => r.product_id));
  }

  async findAll(): Promise<Product[]> {
    const rows: ProductRow[] = await this.db('products')
      .select('product_id', 'product_name', 'category', 'unit_price')
      .orderBy('product_id', 'asc');
    // pg returns NUMERIC as string
    return rows.map((r) => ({ ...r, unit_price: Number(r.unit_price) }));
  }
}
