import { Injectable, Inject } from '@nestjs/common';
import { eq, and, asc } from 'drizzle-orm';
import {
  DATABASE_CONNECTION,
  type DatabaseConnection,
} from '../../database/database.module.js';
import { users } from '../../database/schema/index.js';
import { NotFoundError } from '../../common/errors/scheduling.errors.js';

export interface DoctorSummary {
  id: string;
  email: string;
  fullName: string | null;
}

@Injectable()
export class DoctorService {
  constructor(
    @Inject(DATABASE_CONNECTION) private readonly db: DatabaseConnection,
  ) {}

  async findAll(): Promise<DoctorSummary[]> {
    return this.db
      .select({ id: users.id, email: users.email, fullName: users.fullName })
      .from(users)
      .where(and(eq(users.role, 'doctor'), eq(users.isActive, true)))
      .orderBy(asc(users.email));
  }

  async findOne(id: string): Promise<DoctorSummary | null> {
    const [doctor] = await this.db
      .select({ id: users.id, email: users.email, fullName: users.fullName })
      .from(users)
      .where(
        and(
          eq(users.id, id),
          eq(users.role, 'doctor'),
          eq(users.isActive, true),
        ),
      );
    return doctor ?? null;
  }

  /** Like findOne, but a missing or inactive doctor is a NotFoundError. */
  async getActive(id: string): Promise<DoctorSummary> {
    const doctor = await this.findOne(id);
    if (!doctor) {
      throw new NotFoundError('Doctor not found', { doctorId: id });
    }
    return doctor;
  }
}
