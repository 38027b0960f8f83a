import "dotenv/config";
import { getAddress, isAddress } from "viem";

const apiUrl = (process.env.POOL_API_URL ?? "http://localhost:3000").replace(/\/$/, "");
const apiToken = process.env.API_AUTH_TOKEN;
const adminAddress = process.env.POOL_ADMIN_ADDRESS;

if (!apiToken) throw new Error("API_AUTH_TOKEN is required");
if (!adminAddress || !isAddress(adminAddress, { strict: false })) throw new Error("POOL_ADMIN_ADDRESS is required");

const admin = getAddress(adminAddress);

function getArg(name: string) {
  const idx = process.argv.indexOf(name);
  if (idx === -1) return undefined;
  return process.argv[idx + 1];
}

async function call(method: "GET" | "POST", path: string, body?: Record<string, string>) {
  const response = await fetch(`${apiUrl}${path}`, {
    method,
    headers: {
      "content-type": "application/json",
      "x-api-key": apiToken ?? "",
      "x-caller-address": admin,
    },
    body: body ? JSON.stringify(body) : undefined,
  });
  const payload: unknown = await response.json();
  if (!response.ok) {
    throw new Error(`${method} ${path} failed with ${response.status}: ${JSON.stringify(payload)}`);
  }
  return payload;
}

async function main() {
  const poolId = getArg("--pool") ?? process.env.DEFAULT_POOL_ID;
  if (!poolId) throw new Error("--pool is required");

  const amountArg = getArg("--amount") ?? process.env.PROCEEDS_AMOUNT;
  if (!amountArg || !/^\d+$/.test(amountArg) || BigInt(amountArg) === BigInt(0)) {
    throw new Error("--amount must be a positive integer");
  }

  if (process.argv.includes("--approve")) {
    console.log(`Approving ${amountArg} for pool ${poolId}...`);
    await call("POST", `/pools/${poolId}/assets/approve`, { amount: amountArg });
  }

  console.log(`Depositing ${amountArg} proceeds into pool ${poolId}...`);
  const receipt = await call("POST", `/pools/${poolId}/proceeds`, { amount: amountArg });
  console.log(`Proceeds receipt: ${JSON.stringify(receipt)}`);

  const info = await call("GET", `/pools/${poolId}`);
  console.log(`Pool state: ${JSON.stringify(info)}`);
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
