import type { ID } from "@/models/base";

export interface PlayerContact {
  gender?: string;
  dob?: string;
  phone?: string;
  email?: string;
  club?: string;
  federation?: string;
}

export interface Player extends PlayerContact {
  id: ID;
  name: string;
  rating?: number;
  isActive: boolean;
}

export interface NewPlayerInput extends PlayerContact {
  id?: ID;
  name: string;
  rating?: number;
  isActive?: boolean;
}

export type PlayerChanges = Partial<Pick<Player, "name" | "rating"> & PlayerContact>;
