/**
 * Synthetic e-commerce data generator.
 *
 * Produces customers, products, orders and order items with realistic
 * distributions for exercising the sales report. Rows are yielded lazily so
 * large datasets can be streamed into the database in batches. A fixed seed
 * yields the same dataset every time, provided the generators are consumed
 * in the same order (products, customers, orders, order items).
 */

import { Faker, en } from '@faker-js/faker';

export const CATALOG: ReadonlyArray<{
  category: string;
  subcategories: readonly string[];
  brands: readonly string[];
}> = [
  {
    category: 'Electronics',
    subcategories: ['Phones', 'Laptops', 'Headphones', 'Monitors', 'Cameras'],
    brands: ['Acme', 'Zebra', 'Lux', 'Nova', 'Kite'],
  },
  { category: 'Home', subcategories: ['Kitchen', 'Bedding', 'Furniture', 'Decor'], brands: ['Homely', 'Casa', 'Nido', 'Oak&Co'] },
  { category: 'Outdoors', subcategories: ['Camping', 'Cycling', 'Hiking', 'Fishing'], brands: ['Trail', 'Peak', 'Rivera'] },
  { category: 'Beauty', subcategories: ['Skincare', 'Haircare', 'Fragrance'], brands: ['Aura', 'Bloom', 'Velvet'] },
  { category: 'Toys', subcategories: ['Blocks', 'RC', 'Puzzles', 'Plush'], brands: ['PlayCo', 'Kiddo', 'FunLab'] },
];

export const COUNTRIES = ['UA', 'PL', 'DE', 'FR', 'GB', 'US', 'CA', 'ES', 'IT', 'NL', 'SE', 'NO'] as const;

const ACQUISITION_SOURCES = ['seo', 'sem', 'email', 'social', 'direct', 'referral', 'marketplace'];
// Repeated entries weight the draw.
const ORDER_STATUSES = ['paid', 'paid', 'paid', 'shipped', 'shipped', 'cancelled', 'refunded'];
const PAYMENT_METHODS = ['card', 'card', 'card', 'paypal', 'cod', 'applepay', 'googlepay'];
const CURRENCIES = ['USD', 'EUR', 'PLN', 'GBP'];

// Cumulative probability of 1..6 items per order.
const ITEMS_PER_ORDER_CDF = [0.4, 0.7, 0.88, 0.95, 0.985, 1];

const MS_PER_DAY = 24 * 60 * 60 * 1000;

export interface CustomerRow {
  customer_id: number;
  first_name: string;
  last_name: string;
  email: string;
  signup_date: string;
  country: string;
  city: string;
  marketing_opt_in: boolean;
  acquisition_source: string;
}

export interface ProductRow {
  product_id: number;
  category: string;
  subcategory: string;
  brand: string;
  price: number;
  cost: number;
  created_at: string;
  is_active: boolean;
}

export interface OrderRow {
  order_id: number;
  customer_id: number;
  order_date: Date;
  status: string;
  currency: string;
  payment_method: string;
  shipping_country: string;
  discount: number;
  total_amount: number;
}

export interface OrderItemRow {
  order_item_id: number;
  order_id: number;
  product_id: number;
  quantity: number;
  unit_price: number;
  line_total: number;
}

export interface SyntheticDataset {
  customers: CustomerRow[];
  products: ProductRow[];
  orders: OrderRow[];
  orderItems: OrderItemRow[];
}

export interface SyntheticDataOptions {
  customers: number;
  products: number;
  orders: number;
  seed?: number;
  now?: Date;
  /** Orders are spread uniformly over this many days before `now`. */
  historyDays?: number;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function isoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function createSyntheticDataGenerator(options: SyntheticDataOptions) {
  const { seed = 42, historyDays = 730 } = options;
  const now = options.now ?? new Date();

  const faker = new Faker({ locale: [en] });
  faker.seed(seed);

  function uniform(): number {
    return faker.number.int({ min: 1, max: 1_000_000 }) / 1_000_001;
  }

  // Box-Muller transform.
  function gauss(mean: number, stddev: number): number {
    const u1 = uniform();
    const u2 = uniform();
    return mean + stddev * Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
  }

  function daysAgo(days: number): Date {
    return new Date(now.getTime() - days * MS_PER_DAY);
  }

  function itemsPerOrder(): number {
    const r = uniform();
    const index = ITEMS_PER_ORDER_CDF.findIndex((threshold) => r < threshold);
    return index === -1 ? ITEMS_PER_ORDER_CDF.length : index + 1;
  }

  function* products(): Generator<ProductRow> {
    for (let productId = 1; productId <= options.products; productId++) {
      const entry = faker.helpers.arrayElement(CATALOG);
      const price = round2(5 + uniform() * 895);
      yield {
        product_id: productId,
        category: entry.category,
        subcategory: faker.helpers.arrayElement(entry.subcategories),
        brand: faker.helpers.arrayElement(entry.brands),
        price,
        cost: round2(price * (0.5 + uniform() * 0.35)),
        created_at: isoDate(faker.date.between({ from: daysAgo(5 * 365), to: now })),
        is_active: uniform() > 0.15,
      };
    }
  }

  function* customers(): Generator<CustomerRow> {
    for (let customerId = 1; customerId <= options.customers; customerId++) {
      const firstName = faker.person.firstName();
      const lastName = faker.person.lastName();
      yield {
        customer_id: customerId,
        first_name: firstName,
        last_name: lastName,
        email: `${firstName}.${lastName}.${customerId}@example.com`.toLowerCase(),
        signup_date: isoDate(faker.date.between({ from: daysAgo(3 * 365), to: now })),
        country: faker.helpers.arrayElement(COUNTRIES),
        city: faker.location.city(),
        marketing_opt_in: uniform() < 0.35,
        acquisition_source: faker.helpers.arrayElement(ACQUISITION_SOURCES),
      };
    }
  }

  function* orders(): Generator<OrderRow> {
    const start = daysAgo(historyDays).getTime();
    const spanSeconds = Math.floor((now.getTime() - start) / 1000);

    for (let orderId = 1; orderId <= options.orders; orderId++) {
      const status = faker.helpers.arrayElement(ORDER_STATUSES);
      const seconds = faker.number.int({ min: 0, max: spanSeconds });
      const discount = uniform() < 0.25 ? round2(Math.max(0, gauss(3, 7))) : 0;
      yield {
        order_id: orderId,
        customer_id: faker.number.int({ min: 1, max: options.customers }),
        order_date: new Date(start + seconds * 1000),
        status,
        currency: faker.helpers.arrayElement(CURRENCIES),
        payment_method: faker.helpers.arrayElement(PAYMENT_METHODS),
        shipping_country: faker.helpers.arrayElement(COUNTRIES),
        discount,
        total_amount: round2(Math.abs(gauss(80, 70)) + (status === 'paid' || status === 'shipped' ? 5 : 0)),
      };
    }
  }

  function* orderItems(): Generator<OrderItemRow> {
    let orderItemId = 1;
    for (let orderId = 1; orderId <= options.orders; orderId++) {
      const count = itemsPerOrder();
      for (let i = 0; i < count; i++) {
        const quantity = uniform() < 0.7 ? 1 : faker.number.int({ min: 2, max: 5 });
        const unitPrice = round2(Math.max(1, gauss(60, 50)));
        yield {
          order_item_id: orderItemId++,
          order_id: orderId,
          product_id: faker.number.int({ min: 1, max: options.products }),
          quantity,
          unit_price: unitPrice,
          line_total: round2(unitPrice * quantity),
        };
      }
    }
  }

  return { products, customers, orders, orderItems };
}

export type SyntheticDataGenerator = ReturnType<typeof createSyntheticDataGenerator>;

export function generateSyntheticDataset(options: SyntheticDataOptions): SyntheticDataset {
  const generator = createSyntheticDataGenerator(options);
  const products = [...generator.products()];
  const customers = [...generator.customers()];
  const orders = [...generator.orders()];
  const orderItems = [...generator.orderItems()];
  return { customers, products, orders, orderItems };
}
