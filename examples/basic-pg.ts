/**
 * Basic example using node-postgres (pg) with a throwaway fixture database.
 *
 * Run: npx tsx examples/basic-pg.ts
 */
import pg from 'pg';
import { withFixture } from '../src/index.js';

const { Client } = pg;

async function main() {
  await withFixture(async (db) => {
    console.log(`Fixture database: ${db.database}`);
    console.log(`Connection string: ${db.connectionString}`);

    const client = new Client(db.config);
    await client.connect();

    // Create a table
    await client.query(`
      CREATE TABLE users (
        id INTEGER PRIMARY KEY,
        name TEXT NOT NULL,
        email TEXT UNIQUE
      )
    `);

    // Insert data
    await client.query('INSERT INTO users (id, name, email) VALUES ($1, $2, $3)', [1, 'Alice', 'alice@example.com']);
    await client.query('INSERT INTO users (id, name, email) VALUES ($1, $2, $3)', [2, 'Bob', 'bob@example.com']);

    // Query data
    const result = await client.query('SELECT * FROM users ORDER BY id');
    console.log('Users:', result.rows);

    await client.end();
  });
  console.log('Fixture released.');
}

main().catch(console.error);
