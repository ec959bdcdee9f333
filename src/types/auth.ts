import { VendorStatus } from "./db";

interface AccountIdentity {
  userId: number;
  username: string;
  email: string;
}

export interface CustomerPrincipal extends AccountIdentity {
  role: "customer";
}

export interface VendorPrincipal extends AccountIdentity {
  role: "vendor";
  vendorId: number;
  vendorStatus: VendorStatus;
}

export interface AdminPrincipal extends AccountIdentity {
  role: "admin";
}

export type Principal = CustomerPrincipal | VendorPrincipal | AdminPrincipal;

export type Role = Principal["role"];
