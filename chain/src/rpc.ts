import express, { Express, Request, Response } from "express";
import bodyParser from "body-parser";
import { Server } from "http";
import { Ledger } from "./ledger.js";
import { TransactionError, validateTransactionInput } from "./validation.js";
import { log } from "./logger.js";

export class MethodNotFoundError extends Error {
  constructor(method: unknown) {
    super(`method not found: ${String(method)}`);
    this.name = "MethodNotFoundError";
  }
}

function paramsRecord(params: unknown): Record<string, unknown> {
  if (params === undefined || params === null) return {};
  if (typeof params !== "object" || Array.isArray(params)) {
    throw new TransactionError("INVALID_PARAMS", "params must be an object");
  }
  return { ...params };
}

function requireString(params: Record<string, unknown>, key: string): string {
  const value = params[key];
  if (typeof value !== "string" || value === "") {
    throw new TransactionError("INVALID_ADDRESS", `params.${key} must be a non-empty string`);
  }
  return value;
}

export async function dispatchRpc(ledger: Ledger, method: unknown, params: unknown): Promise<unknown> {
  switch (method) {
    case "ledger_submitTx": {
      const p = paramsRecord(params);
      validateTransactionInput(p);
      return ledger.submitTransaction(p.sender, p.receiver, p.amount);
    }
    case "ledger_mine":
      return ledger.minePendingTransactions(requireString(paramsRecord(params), "minerAddress"));
    case "ledger_getBalance":
      return ledger.getBalance(requireString(paramsRecord(params), "address"));
    case "ledger_getBalances":
      return Object.fromEntries(ledger.getBalances());
    case "ledger_isValid":
      return ledger.isValid();
    case "ledger_getChain":
      return ledger.chain;
    case "ledger_getBlock": {
      const { index } = paramsRecord(params);
      if (typeof index !== "number" || !Number.isInteger(index) || index < 0 || index >= ledger.chain.length) {
        throw new TransactionError("INVALID_PARAMS", `no block at index ${String(index)}`);
      }
      return ledger.chain[index];
    }
    case "ledger_getPending":
      return ledger.pending;
    default:
      throw new MethodNotFoundError(method);
  }
}

export function createRpcApp(ledger: Ledger): Express {
  const app = express();
  app.use(bodyParser.json());

  app.post("/", async (req: Request, res: Response): Promise<void> => {
    const { method, params, id } = req.body ?? {};
    try {
      const result = await dispatchRpc(ledger, method, params);
      res.json({ jsonrpc: "2.0", id, result });
    } catch (e: unknown) {
      if (e instanceof MethodNotFoundError) {
        res.status(400).json({ jsonrpc: "2.0", id, error: "method not found" });
      } else if (e instanceof TransactionError) {
        res.status(400).json({ jsonrpc: "2.0", id, error: e.message });
      } else {
        log.error(`RPC ${String(method)} failed`, e);
        res.status(500).json({ jsonrpc: "2.0", id, error: e instanceof Error ? e.message : String(e) });
      }
    }
  });

  return app;
}

export function startRpc(ledger: Ledger, port = 8545): Server {
  return createRpcApp(ledger).listen(port, () => log.info(`📡 JSON-RPC listening on :${port}`));
}
