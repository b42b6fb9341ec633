import { SizeClass } from "./vehicle.dto";

export interface VipPass {
  id: string;
  customerKey: string;
  size: SizeClass;
  issuedAt: Date;
  expiresAt: Date;
  amountPaid: number;
}

export function isPassActive(pass: VipPass, size: SizeClass, now: Date): boolean {
  return pass.size === size && now.getTime() < pass.expiresAt.getTime();
}
