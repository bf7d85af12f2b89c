import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { Customer, Offer } from '../types/types';
import { logger } from '../utils/logger';

const customerRecordSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  phone: z.string().regex(/^\d{10}$/),
  city: z.string(),
  credit_score: z.number(),
  preapproved_limit: z.number().nonnegative(),
  salary: z.number().nonnegative()
});

const offerRecordSchema = z.object({
  customer_id: z.string().min(1),
  interest_rate: z.number().nonnegative()
});

export interface CustomerRepository {
  findByPhone(phone: string): Customer | null;
  findOfferByCustomerId(customerId: string): Offer | null;
}

/**
 * Read-only CRM backed by `customers.json` and `offers.json`, loaded once.
 */
export class JsonCustomerRepository implements CustomerRepository {
  private readonly customersByPhone: Map<string, Customer>;
  private readonly offersByCustomer: Map<string, Offer>;

  constructor(customers: Customer[], offers: Offer[]) {
    this.customersByPhone = new Map(customers.map(c => [c.phone, c]));
    this.offersByCustomer = new Map(offers.map(o => [o.customerId, o]));
  }

  static fromDirectory(dataDir: string): JsonCustomerRepository {
    const customers = z
      .array(customerRecordSchema)
      .parse(readJson(path.join(dataDir, 'customers.json')))
      .map(
        (r): Customer => ({
          id: r.id,
          name: r.name,
          phone: r.phone,
          city: r.city,
          creditScore: r.credit_score,
          preApprovedLimit: r.preapproved_limit,
          monthlySalary: r.salary
        })
      );
    const offers = z
      .array(offerRecordSchema)
      .parse(readJson(path.join(dataDir, 'offers.json')))
      .map((r): Offer => ({ customerId: r.customer_id, interestRate: r.interest_rate }));

    logger.info('Customer records loaded', { dataDir, customers: customers.length, offers: offers.length });
    return new JsonCustomerRepository(customers, offers);
  }

  findByPhone(phone: string): Customer | null {
    return this.customersByPhone.get(phone) ?? null;
  }

  findOfferByCustomerId(customerId: string): Offer | null {
    return this.offersByCustomer.get(customerId) ?? null;
  }
}

function readJson(filePath: string): unknown {
  return JSON.parse(fs.readFileSync(filePath, 'utf8'));
}
