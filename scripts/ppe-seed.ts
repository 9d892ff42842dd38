import 'dotenv/config';
import { pool, withTransaction } from '../src/db';

type SeedItem = { name: string; category: 'clothing' | 'footwear' };

const ITEMS: SeedItem[] = [
  { name: 'Hi-Vis Vest', category: 'clothing' },
  { name: 'Hard Hat', category: 'clothing' },
  { name: 'Work Gloves', category: 'clothing' },
  { name: 'Safety Boots', category: 'footwear' },
  { name: 'Rigger Boots', category: 'footwear' }
];

const SIZES: Record<SeedItem['category'], string[]> = {
  clothing: ['XS', 'S', 'M', 'L', 'XL', 'XXL'],
  footwear: ['6', '7', '8', '9', '10', '11', '12']
};

async function seed() {
  try {
    const counts = await withTransaction(async (client) => {
      let items = 0;
      let sizes = 0;
      for (const item of ITEMS) {
        const res = await client.query(
          `INSERT INTO ppe_list (name, category) VALUES ($1, $2)
           ON CONFLICT (name) DO NOTHING`,
          [item.name, item.category]
        );
        items += res.rowCount ?? 0;
      }
      for (const [category, codes] of Object.entries(SIZES)) {
        for (const [index, code] of codes.entries()) {
          const res = await client.query(
            `INSERT INTO ppe_sizes (category, size_code, sort_order)
             SELECT $1::ppe_category, $2, $3
              WHERE NOT EXISTS (
                SELECT 1 FROM ppe_sizes WHERE category = $1::ppe_category AND size_code = $2
              )`,
            [category, code, index + 1]
          );
          sizes += res.rowCount ?? 0;
        }
      }
      return { items, sizes };
    });
    console.log(`Seeded ${counts.items} PPE item(s) and ${counts.sizes} size(s)`);
  } catch (error: unknown) {
    console.error('Seed error:', error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  } finally {
    await pool.end();
  }
}

void seed();
