/**
 * Who is performing an operation. Every write is attributed to an actor in
 * the audit log; citizens are confined to their own identity.
 */
export type AdminActor = {
  role: "Admin";
  adminId: number;
  username: string;
  ipAddress?: string | null;
};

export type CitizenActor = {
  role: "Citizen";
  citizenId: number;
  username: string;
  nationalId: string;
  ipAddress?: string | null;
};

export type SystemActor = {
  role: "System";
  username: string;
  ipAddress?: string | null;
};

export type Actor = AdminActor | CitizenActor | SystemActor;

export const SYSTEM_ACTOR: SystemActor = { role: "System", username: "system" };

export function canActOn(actor: Actor, nationalId: string): boolean {
  return actor.role !== "Citizen" || actor.nationalId === nationalId;
}

/** Back-office actors: administrators and system jobs. */
export type StaffActor = AdminActor | SystemActor;
