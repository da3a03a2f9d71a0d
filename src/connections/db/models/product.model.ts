// Product Model - row shape of the products table

export interface Product {
  id: number;
  name: string; // not unique
  price: string; // NUMERIC(12, 2), pg returns it as string
  stock_quantity: number; // CHECK (stock_quantity >= 0)
  version: number; // bumped on every mutation
  created_at: Date;
  updated_at: Date;
}

export type ProductStockRow = Pick<Product, 'id' | 'name' | 'price' | 'stock_quantity' | 'version'>;

export type ProductNameRow = Pick<Product, 'id' | 'name'>;
