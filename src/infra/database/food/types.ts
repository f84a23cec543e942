import type { Generated } from 'kysely';

// Providers Table
export interface Providers {
  Provider_ID: Generated<number>;
  Name: string;
  Type: string;
  Address: string | null;
  City: string;
  Contact: string | null;
}

// Receivers Table (read-only here)
export interface Receivers {
  Receiver_ID: Generated<number>;
  Name: string;
  Type: string | null;
  City: string;
  Contact: string | null;
}

// Food Listings Table
export interface FoodListings {
  Food_ID: Generated<number>;
  Food_Name: string;
  Quantity: number;
  Expiry_Date: string; // YYYY-MM-DD
  Provider_ID: number;
  Provider_Type: string; // snapshot of Providers.Type at insert time
  Location: string;
  Food_Type: string;
  Meal_Type: string;
}

// Claims Table (read-only here)
export interface Claims {
  Claim_ID: Generated<number>;
  Food_ID: number;
  Receiver_ID: number;
  Status: string; // Pending | Completed | Cancelled
  Timestamp: string | null;
}

export interface FoodDatabase {
  Providers: Providers;
  Receivers: Receivers;
  Food_Listings: FoodListings;
  Claims: Claims;
}
