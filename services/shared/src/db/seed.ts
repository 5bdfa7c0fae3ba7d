import { promises as fs } from 'fs';
import { join } from 'path';
import { pool, withTransaction } from './client';
import { logger } from '../utils/logger';

interface SeedData {
     warehouses: Array<{ code: string; name: string; capacity: number }>;
     items: Array<{
          sku: string;
          name: string;
          costPrice: number;
          sellingPrice: number;
          reorderLevel: number;
     }>;
     vendors: string[];
     clients: string[];
     stock: Array<{
          sku: string;
          warehouse: string;
          quantity: number;
          minQuantity: number;
          maxQuantity: number | null;
     }>;
}

async function loadSeedData(): Promise<SeedData> {
     const raw = await fs.readFile(join(__dirname, 'seed-data.json'), 'utf-8');
     return JSON.parse(raw);
}

async function seedDatabase() {
     try {
          logger.info('Seeding database with demo data');
          const data = await loadSeedData();

          await withTransaction(async (client) => {
               for (const warehouse of data.warehouses) {
                    await client.query(
                         `
          INSERT INTO warehouse (code, name, capacity)
          VALUES ($1, $2, $3)
          ON CONFLICT (code) DO NOTHING
        `,
                         [warehouse.code, warehouse.name, warehouse.capacity]
                    );
               }
               logger.info({ count: data.warehouses.length }, 'Inserted warehouses');

               for (const item of data.items) {
                    await client.query(
                         `
          INSERT INTO item (sku, name, cost_price, selling_price, reorder_level)
          VALUES ($1, $2, $3, $4, $5)
          ON CONFLICT (sku) DO NOTHING
        `,
                         [item.sku, item.name, item.costPrice, item.sellingPrice, item.reorderLevel]
                    );
               }
               logger.info({ count: data.items.length }, 'Inserted items');

               for (const name of data.vendors) {
                    await client.query(
                         `INSERT INTO vendor (name) SELECT $1::varchar WHERE NOT EXISTS (SELECT 1 FROM vendor WHERE name = $1)`,
                         [name]
                    );
               }
               for (const name of data.clients) {
                    await client.query(
                         `INSERT INTO client (name) SELECT $1::varchar WHERE NOT EXISTS (SELECT 1 FROM client WHERE name = $1)`,
                         [name]
                    );
               }
               logger.info(
                    { vendors: data.vendors.length, clients: data.clients.length },
                    'Inserted vendors and clients'
               );

               // Opening balances; the average cost starts at the item's cost price
               for (const row of data.stock) {
                    await client.query(
                         `
          INSERT INTO stock_ledger (item_id, warehouse_id, quantity, min_quantity, max_quantity, average_cost)
          SELECT i.id, w.id, $3, $4, $5, i.cost_price
          FROM item i, warehouse w
          WHERE i.sku = $1 AND w.code = $2
          ON CONFLICT ON CONSTRAINT stock_ledger_item_warehouse_key DO NOTHING
        `,
                         [row.sku, row.warehouse, row.quantity, row.minQuantity, row.maxQuantity]
                    );
               }
               logger.info({ count: data.stock.length }, 'Inserted opening stock');
          });

          logger.info('Database seeding completed successfully');
     } catch (err) {
          logger.error({ err }, 'Seeding failed');
          throw err;
     } finally {
          await pool.end();
     }
}

// Run if executed directly
if (require.main === module) {
     seedDatabase().catch((err) => {
          logger.error({ err }, 'Seed error');
          process.exit(1);
     });
}

export { seedDatabase };
