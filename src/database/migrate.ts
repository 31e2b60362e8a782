import { neon } from '@neondatabase/serverless';
import * as dotenv from 'dotenv';

// Load env files
dotenv.config({ path: '.env.local' });
dotenv.config({ path: '.env' });

export async function runMigrations(): Promise<void> {
  const databaseUrl = process.env.DATABASE_URL;

  if (!databaseUrl) {
    console.error('DATABASE_URL not found');
    throw new Error('DATABASE_URL environment variable is required');
  }

  const sql = neon(databaseUrl);

  const tableExists = async (tableName: string): Promise<boolean> => {
    const result = await sql`
      SELECT EXISTS (
        SELECT FROM information_schema.tables
        WHERE table_schema = 'public'
        AND table_name = ${tableName}
      ) as exists
    `;
    return result[0]?.exists === true;
  };

  console.log('Checking/creating database schema...');

  if (!(await tableExists('users'))) {
    console.log('Creating users table...');
    await sql`
      CREATE TABLE users (
        id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
        email VARCHAR(255) NOT NULL UNIQUE,
        role VARCHAR(20) NOT NULL CHECK (role IN ('patient', 'doctor', 'admin')),
        full_name VARCHAR(255),
        is_active BOOLEAN NOT NULL DEFAULT true,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `;
  }

  if (!(await tableExists('payments'))) {
    console.log('Creating payments table...');
    await sql`
      CREATE TABLE payments (
        id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
        user_id UUID NOT NULL REFERENCES users(id) ON DELETE CASCADE,
        amount_cents INT NOT NULL,
        currency VARCHAR(10) NOT NULL DEFAULT 'usd',
        provider_reference VARCHAR(255) UNIQUE,
        status VARCHAR(20) NOT NULL DEFAULT 'created',
        description VARCHAR(255),
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `;
  }

  if (!(await tableExists('availability_windows'))) {
    console.log('Creating availability_windows table...');
    await sql`
      CREATE TABLE availability_windows (
        id BIGSERIAL PRIMARY KEY,
        doctor_id UUID NOT NULL REFERENCES users(id) ON DELETE CASCADE,
        date DATE NOT NULL,
        start_time TIME NOT NULL,
        end_time TIME NOT NULL,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        CHECK (start_time < end_time)
      )
    `;
  }

  if (!(await tableExists('appointments'))) {
    console.log('Creating appointments table...');
    await sql`
      CREATE TABLE appointments (
        id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
        patient_id UUID NOT NULL REFERENCES users(id) ON DELETE CASCADE,
        doctor_id UUID NOT NULL REFERENCES users(id) ON DELETE CASCADE,
        scheduled_for TIMESTAMPTZ NOT NULL,
        reason TEXT,
        status VARCHAR(20) NOT NULL DEFAULT 'requested',
        payment_id UUID REFERENCES payments(id) ON DELETE SET NULL,
        rescheduled_from_id UUID REFERENCES appointments(id) ON DELETE SET NULL,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `;
  }

  console.log('All tables created/verified');

  console.log('Creating indexes...');
  await sql`CREATE INDEX IF NOT EXISTS idx_users_role ON users(role)`;
  await sql`CREATE INDEX IF NOT EXISTS idx_payments_user ON payments(user_id)`;
  await sql`CREATE INDEX IF NOT EXISTS idx_windows_doctor_date ON availability_windows(doctor_id, date, start_time)`;
  await sql`CREATE INDEX IF NOT EXISTS idx_appt_doctor_time ON appointments(doctor_id, scheduled_for)`;
  await sql`CREATE INDEX IF NOT EXISTS idx_appt_patient_time ON appointments(patient_id, scheduled_for)`;

  // One active appointment per doctor and slot start. Inserts racing past the
  // service-level pre-check fail here with 23505.
  console.log('Creating slot uniqueness constraint...');
  await sql`
    CREATE UNIQUE INDEX IF NOT EXISTS uq_appt_doctor_slot_active
    ON appointments(doctor_id, scheduled_for)
    WHERE status NOT IN ('cancelled', 'rejected')
  `;

  console.log('Migration completed successfully');
}

// Run directly if called as script
const isMainModule = process.argv[1]?.includes('migrate');
if (isMainModule) {
  runMigrations()
    .then(() => process.exit(0))
    .catch((err) => {
      console.error(err);
      process.exit(1);
    });
}
