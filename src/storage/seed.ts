/**
 * Prism - Demo Data Seeder
 * Populates dp_complaints, dp_call_reports and dp_macro_rates with
 * deterministic synthetic data
 */

import type Database from 'better-sqlite3';

import logger from '../utils/logger.js';

export interface SeedSummary {
  complaints: number;
  callReports: number;
  macroRates: number;
}

// =============================================================================
// Reference Values
// =============================================================================

const PRODUCTS = ['Mortgage', 'Credit card', 'Student loan', 'Vehicle loan', 'Checking account', 'Savings account'];

const ISSUES = [
  'Billing disputes',
  'Incorrect information',
  'Communication tactics',
  'Closing/cancelling account',
  'Managing an account',
  'Struggling to pay',
];

const COMPANIES = ['JPMorgan Chase', 'Bank of America', 'Wells Fargo', 'Citibank', 'US Bank', 'PNC Bank'];

const STATES = ['CA', 'TX', 'NY', 'FL', 'IL', 'OH', 'PA', 'GA', 'NC', 'MI'];

const CHANNELS = ['Web', 'Phone', 'Referral', 'Mail', 'Fax'];

const FIRST_YEAR = 2020;
const LAST_YEAR = 2025;
const LAST_MONTH = 6;
const LAST_QUARTER = 2;

// =============================================================================
// Random Helpers
// =============================================================================

type Rng = () => number;

function mulberry32(seed: number): Rng {
  let t = seed >>> 0;
  return () => {
    t = (t + 0x6d2b79f5) >>> 0;
    let r = Math.imul(t ^ (t >>> 15), t | 1);
    r ^= r + Math.imul(r ^ (r >>> 7), r | 61);
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
  };
}

function randomInt(rand: Rng, min: number, max: number): number {
  return min + Math.floor(rand() * (max - min + 1));
}

function uniform(rand: Rng, min: number, max: number): number {
  return min + rand() * (max - min);
}

function choice(rand: Rng, values: readonly string[]): string {
  return values[Math.floor(rand() * values.length)] ?? '';
}

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

// =============================================================================
// Tables
// =============================================================================

function seedComplaints(db: Database.Database): number {
  db.exec(`
    CREATE TABLE dp_complaints (
      complaint_id INTEGER,
      date_received TEXT,
      product TEXT,
      issue TEXT,
      company TEXT,
      state TEXT,
      channel TEXT,
      timely INTEGER,
      disputed INTEGER,
      consumer_complaint_narrative TEXT
    )
  `);

  const insert = db.prepare('INSERT INTO dp_complaints VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)');
  const rand = mulberry32(42);
  let complaintId = 1;

  for (let year = FIRST_YEAR; year <= LAST_YEAR; year++) {
    for (let month = 1; month <= 12; month++) {
      if (year === LAST_YEAR && month > LAST_MONTH) break;

      const count = randomInt(rand, 30, 80);
      for (let i = 0; i < count; i++) {
        const day = randomInt(rand, 1, 28);
        insert.run(
          complaintId,
          `${year}-${pad2(month)}-${pad2(day)}`,
          choice(rand, PRODUCTS),
          choice(rand, ISSUES),
          choice(rand, COMPANIES),
          choice(rand, STATES),
          choice(rand, CHANNELS),
          rand() > 0.1 ? 1 : 0,
          rand() > 0.85 ? 1 : 0,
          // narratives are never populated
          null
        );
        complaintId++;
      }
    }
  }

  return complaintId - 1;
}

function seedCallReports(db: Database.Database): number {
  db.exec(`
    CREATE TABLE dp_call_reports (
      quarter TEXT,
      bank_name TEXT,
      bank_id INTEGER,
      assets REAL,
      deposits REAL,
      net_income REAL,
      npa REAL,
      tier1_ratio REAL
    )
  `);

  const insert = db.prepare('INSERT INTO dp_call_reports VALUES (?, ?, ?, ?, ?, ?, ?, ?)');
  const rand = mulberry32(123);
  let rows = 0;

  COMPANIES.forEach((bank, index) => {
    let baseAssets = uniform(rand, 500_000, 3_000_000);

    for (let year = FIRST_YEAR; year <= LAST_YEAR; year++) {
      for (let quarter = 1; quarter <= 4; quarter++) {
        if (year === LAST_YEAR && quarter > LAST_QUARTER) break;

        const assets = baseAssets * (1 + uniform(rand, -0.02, 0.05));
        const deposits = assets * uniform(rand, 0.6, 0.8);
        const netIncome = assets * uniform(rand, 0.005, 0.02);

        insert.run(
          `${year}-Q${quarter}`,
          bank,
          index + 1,
          round(assets, 2),
          round(deposits, 2),
          round(netIncome, 2),
          round(uniform(rand, 0.5, 3.0), 2),
          round(uniform(rand, 10.0, 16.0), 2)
        );
        baseAssets = assets;
        rows++;
      }
    }
  });

  return rows;
}

function seedMacroRates(db: Database.Database): number {
  db.exec(`
    CREATE TABLE dp_macro_rates (
      rate_date TEXT,
      fed_funds REAL,
      treasury_10y REAL
    )
  `);

  const insert = db.prepare('INSERT INTO dp_macro_rates VALUES (?, ?, ?)');
  const rand = mulberry32(999);
  const end = Date.UTC(LAST_YEAR, LAST_MONTH, 0);
  let fedFunds = 1.5;
  let treasury10y = 2.0;
  let rows = 0;

  for (let day = Date.UTC(FIRST_YEAR, 0, 1); day <= end; day += 86_400_000) {
    fedFunds = Math.max(0, fedFunds + uniform(rand, -0.05, 0.05));
    treasury10y = Math.max(0.5, treasury10y + uniform(rand, -0.03, 0.04));
    insert.run(new Date(day).toISOString().slice(0, 10), round(fedFunds, 4), round(treasury10y, 4));
    rows++;
  }

  return rows;
}

/**
 * (Re)create and fill the demo tables. Output is identical on every call.
 */
export function seedDatabase(db: Database.Database): SeedSummary {
  const run = db.transaction((): SeedSummary => {
    db.exec('DROP TABLE IF EXISTS dp_complaints; DROP TABLE IF EXISTS dp_call_reports; DROP TABLE IF EXISTS dp_macro_rates;');
    return {
      complaints: seedComplaints(db),
      callReports: seedCallReports(db),
      macroRates: seedMacroRates(db),
    };
  });

  const summary = run();
  logger.info('Demo data seeded', { ...summary });
  return summary;
}
