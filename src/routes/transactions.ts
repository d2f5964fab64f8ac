import type { FastifyInstance } from "fastify";
import type { Ledger } from "../chain/ledger";
import type { TransactionInfo } from "../interfaces";

const transactionBodySchema = {
  type: 'object',
  required: ['sender', 'recipient', 'amount'],
  additionalProperties: false,
  properties: {
    sender: { type: 'string', minLength: 1 },
    recipient: { type: 'string', minLength: 1 },
    amount: { type: 'number' },
  },
} as const;

export async function registerTransactionRoutes(app: FastifyInstance, ledger: Ledger) {
  app.post<{ Body: TransactionInfo }>(
    '/transactions',
    { schema: { body: transactionBodySchema } },
    async (request) => {
      const { sender, recipient, amount } = request.body;
      const transaction = ledger.addTransaction(sender, recipient, amount);

      return {
        status: 'Transaction added',
        transactionId: transaction.transactionId,
        pending: ledger.pendingTransactions.length,
      };
    },
  );

  app.get('/transactions/pending', async () => {
    const transactions = ledger.pendingTransactions;
    return { transactions, count: transactions.length };
  });
}
