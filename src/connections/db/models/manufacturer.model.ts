// Manufacturer Model

export interface Manufacturer {
  id: number;
  name: string; // unique
  created_at: Date;
}

export type ManufacturerRow = {
  id: number;
  name: string;
  created_at: Date;
};
