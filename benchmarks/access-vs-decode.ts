import { run, bench, group, summary } from 'mitata';
import { Address, BitString, Dictionary, LayoutRegistry, decodeEager, decodeLazy, encode, openLazyUnion, t } from '../src/index.ts';

const registry = new LayoutRegistry();

const Transfer = registry.registerRecord(
  'Transfer',
  {
    queryId: t.bigUint(64),
    amount: t.coins,
    destination: t.address,
    responseTo: t.address,
    forwardAmount: t.coins,
    note: t.maybe(t.uint(32)),
    payload: t.snake,
  },
  { opcode: '0x0f8a7ea5' },
);

const Burn = registry.registerRecord('Burn', { queryId: t.bigUint(64), amount: t.coins }, { opcode: '0x595f07bc' });
const JettonMsg = registry.registerUnion('JettonMsg', [Transfer, Burn]);

const transfer = {
  queryId: 1n,
  amount: 10_000_000_000n,
  destination: Address.parseRaw('0:' + '12'.repeat(32)),
  responseTo: Address.parseRaw('0:' + '34'.repeat(32)),
  forwardAmount: 1n,
  note: 7,
  payload: BitString.fromBinary('01'.repeat(600)),
};

const transferCell = encode(transfer, Transfer);
const unionCell = encode({ tag: 'Transfer', value: transfer }, JettonMsg);

summary(() => {
  group('tolk-codec: lazy vs eager (Transfer)', () => {
    bench('decodeEager (full object)', () => {
      decodeEager(transferCell, Transfer);
    }).baseline();

    bench('decodeLazy (open only)', () => {
      decodeLazy(transferCell, Transfer);
    });

    bench('decodeLazy + read 1 field', () => {
      decodeLazy(transferCell, Transfer).get('queryId');
    });

    bench('decodeLazy + read last fixed field', () => {
      decodeLazy(transferCell, Transfer).get('note');
    });

    bench('decodeLazy + toObject', () => {
      decodeLazy(transferCell, Transfer).toObject();
    });
  });
});

summary(() => {
  group('tolk-codec: union dispatch', () => {
    bench('decodeEager (union)', () => {
      decodeEager(unionCell, JettonMsg);
    }).baseline();

    bench('openLazyUnion + match', () => {
      openLazyUnion(unionCell, JettonMsg).match({
        Transfer: (v) => v.get('amount'),
        Burn: (v) => v.get('amount'),
      });
    });
  });
});

const balances = Array.from({ length: 256 }, (_, i) => i).reduce(
  (d, k) => d.set(k * 97, BigInt(k)),
  Dictionary.empty(t.uint(16), t.coins),
);

group('tolk-codec: dictionary', () => {
  bench('get', () => {
    balances.get(97 * 128);
  });

  bench('set', () => {
    balances.set(1, 1n);
  });

  bench('next', () => {
    balances.next(97 * 128);
  });
});

await run();
