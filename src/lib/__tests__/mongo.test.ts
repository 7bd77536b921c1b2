/**
 * MongoDB Connection Tests
 */

import { connectDB, supportsTransactions } from '../mongo';

const mockConnect = jest.fn(async () => undefined);
const mockDisconnect = jest.fn(async () => undefined);
const mockCommand = jest.fn<Promise<Record<string, unknown>>, [Record<string, unknown>]>();

jest.mock('mongoose', () => ({
  __esModule: true,
  default: {
    connect: () => mockConnect(),
    disconnect: () => mockDisconnect(),
    connection: {
      readyState: 0,
      db: { admin: () => ({ command: (cmd: Record<string, unknown>) => mockCommand(cmd) }) },
    },
  },
}));

const URI = 'mongodb://localhost:27017/autoria';

describe('supportsTransactions', () => {
  it('should accept replica set members and mongos', () => {
    expect(supportsTransactions({ setName: 'rs0' })).toBe(true);
    expect(supportsTransactions({ msg: 'isdbgrid' })).toBe(true);
  });

  it('should reject a standalone server', () => {
    expect(supportsTransactions({})).toBe(false);
  });
});

describe('connectDB', () => {
  beforeEach(() => {
    mockConnect.mockClear();
    mockDisconnect.mockClear();
    mockCommand.mockReset();
  });

  it('should fail fast on a standalone server when transactions are required', async () => {
    mockCommand.mockResolvedValue({ isWritablePrimary: true, maxWireVersion: 21 });

    await expect(connectDB(URI, { requireTransactions: true })).rejects.toThrow(
      'MongoDB is a standalone server'
    );
    expect(mockCommand).toHaveBeenCalledWith({ hello: 1 });
    expect(mockDisconnect).toHaveBeenCalledTimes(1);
  });

  it('should connect to a replica set when transactions are required', async () => {
    mockCommand.mockResolvedValue({ isWritablePrimary: true, setName: 'rs0' });

    await expect(connectDB(URI, { requireTransactions: true })).resolves.toBeUndefined();
    expect(mockDisconnect).not.toHaveBeenCalled();
  });

  it('should skip the topology check when transactions are not required', async () => {
    await connectDB(URI);

    expect(mockConnect).toHaveBeenCalledTimes(1);
    expect(mockCommand).not.toHaveBeenCalled();
  });
});
