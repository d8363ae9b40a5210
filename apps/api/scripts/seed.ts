/**
 * Seed script: an administrator plus a few identities with linked service records.
 * Run: npm run seed (from apps/api). The admin password comes from SEED_ADMIN_PASSWORD.
 */
import { promises as fs } from "fs";
import path from "path";
import { z } from "zod";
import { SYSTEM_ACTOR } from "../src/actor";
import { createAdminAccount } from "../src/auth";
import { registerBankAccount } from "../src/bank-accounts";
import { registerCriminalCase } from "../src/criminal-cases";
import { isRegistryError } from "../src/errors";
import { createIdentity } from "../src/identities";
import { runWithLogContext } from "../src/log-context";
import { registerSim } from "../src/sims";
import { getRegistryStore } from "../src/store";
import { registerTaxId } from "../src/tax-ids";
import { registerVoterRecord } from "../src/voter-records";

const SEED_DATA_PATH = path.resolve(__dirname, "seed-data.json");

// Shape only; field rules are applied by the domain modules on insert.
const SeedFileSchema = z.object({
  admins: z.array(z.object({ username: z.string(), fullName: z.string() })),
  identities: z.array(
    z.object({
      nationalId: z.string(),
      name: z.string(),
      gender: z.enum(["M", "F", "O"]),
      birthDate: z.string(),
      mobile: z.string(),
      email: z.string().nullable(),
      taxIds: z.array(z.object({ code: z.string(), issueDate: z.string() })),
      voterRecords: z.array(
        z.object({
          code: z.string(),
          address: z.string(),
          registrationType: z.enum(["City", "Village", "Rural", "Urban", "Other"]),
          isPrimary: z.boolean(),
        })
      ),
      sims: z.array(z.object({ simNumber: z.string(), provider: z.string() })),
      bankAccounts: z.array(
        z.object({ accountNumber: z.string(), bankName: z.string(), accountType: z.string(), branchCode: z.string() })
      ),
    })
  ),
  criminalCases: z.array(z.object({ offence: z.string(), nationalIds: z.array(z.string()) })),
});

async function loadSeedData() {
  const raw = await fs.readFile(SEED_DATA_PATH, "utf-8");
  return SeedFileSchema.parse(JSON.parse(raw));
}

/** Existing rows are left alone so the seed can be re-run. */
async function skipIfExists(label: string, work: () => Promise<unknown>): Promise<void> {
  try {
    await work();
    console.log(`  + ${label}`);
  } catch (error) {
    if (isRegistryError(error) && error.kind === "CONFLICT") {
      console.log(`  = ${label} (already present)`);
      return;
    }
    throw error;
  }
}

async function seed() {
  const adminPassword = process.env.SEED_ADMIN_PASSWORD;
  if (!adminPassword) {
    throw new Error("SEED_ADMIN_PASSWORD must be set");
  }
  const data = await loadSeedData();

  console.log("Seeding administrators...");
  for (const admin of data.admins) {
    await skipIfExists(`admin ${admin.username}`, () =>
      createAdminAccount({ username: admin.username, password: adminPassword, fullName: admin.fullName })
    );
  }

  console.log("Seeding identities...");
  for (const entry of data.identities) {
    const { taxIds, voterRecords, sims, bankAccounts, ...identity } = entry;
    await skipIfExists(`identity ${identity.nationalId}`, () => createIdentity(identity, SYSTEM_ACTOR));
    for (const taxId of taxIds) {
      await skipIfExists(`tax ID ${taxId.code}`, () => registerTaxId(identity.nationalId, taxId, SYSTEM_ACTOR));
    }
    for (const voter of voterRecords) {
      await skipIfExists(`voter record ${voter.code}`, () =>
        registerVoterRecord(identity.nationalId, voter, SYSTEM_ACTOR)
      );
    }
    for (const sim of sims) {
      await skipIfExists(`SIM ${sim.simNumber}`, () => registerSim(identity.nationalId, sim, SYSTEM_ACTOR));
    }
    for (const account of bankAccounts) {
      await skipIfExists(`bank account ${account.bankName}/${account.accountNumber}`, () =>
        registerBankAccount(identity.nationalId, account, SYSTEM_ACTOR)
      );
    }
  }

  console.log("Seeding criminal cases...");
  const existing = await getRegistryStore().transaction((tx) => tx.registryStatistics(), { readOnly: true });
  if (existing.criminal_cases > 0) {
    console.log("  = criminal cases (already present)");
  } else {
    for (const criminalCase of data.criminalCases) {
      const created = await registerCriminalCase(criminalCase, SYSTEM_ACTOR);
      console.log(`  + case ${created.caseNumber}`);
    }
  }
}

runWithLogContext({ actor: SYSTEM_ACTOR.username }, seed)
  .then(async () => {
    await getRegistryStore().close();
    console.log("Seed complete.");
  })
  .catch(async (error) => {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`Seed failed: ${message}`);
    await getRegistryStore().close();
    process.exit(1);
  });
