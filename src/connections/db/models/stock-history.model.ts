// Row returned by the stock decrement, one per product that was updated
export interface StockChangeRow {
  id: number;
  previous_stock: number;
  new_stock: number;
  version: number;
}
