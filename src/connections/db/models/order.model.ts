// Order Model - row shape of the orders table

export interface Order {
  id: number;
  user_id: string; // opaque owning-user identity
  order_number: string; // unique
  total_amount: string; // NUMERIC(30, 2) - computed, never caller supplied
  created_at: Date;
}

export interface OrderWithItems extends Order {
  items: OrderItemSummary[];
}

export interface OrderItemSummary {
  product_id: number;
  quantity: number;
  unit_price: string;
  line_total: string;
}
