// Quick smoke test against a running API server
// Assumes server running on TS_API_PORT (default 8082). Override via env.

const port = Number(process.env.TS_API_PORT || 8082);
const base = `http://127.0.0.1:${port}`;

async function post(path: string, body: unknown): Promise<unknown> {
  const res = await fetch(`${base}${path}`, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body),
  });
  return res.json();
}

async function main() {
  const scan = {
    snapshots: [
      { venue: "uniswap_v3", token0: "USDC", token1: "DAI", reserve0: "500000", reserve1: "500000", fee: "0.003" },
      { venue: "sushiswap", token0: "USDC", token1: "DAI", reserve0: "505000", reserve1: "495000", fee: "0.003" },
    ],
    amountIn: "1000",
    gasCost: "5",
  };

  try {
    const found = await post("/api/scan", scan);
    console.log(JSON.stringify(found, null, 2));
    const bundle = await post("/api/bundle", { signedTxs: ["0xdeadbeef01", "0xdeadbeef02"] });
    console.log(JSON.stringify(bundle, null, 2));
  } catch (e) {
    console.error("smoke_scan error:", e);
    process.exitCode = 1;
  }
}

void main();
