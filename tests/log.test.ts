import { createLogger, stripLineContinuations } from '../src/index';

function sink() {
  const chunks: string[] = [];
  return {
    write: (chunk: string) => {
      chunks.push(chunk);
      return true;
    },
    text: () => chunks.join(''),
  };
}

describe('createLogger', () => {
  it('writes prefixed lines to the right stream', () => {
    const out = sink();
    const err = sink();
    const log = createLogger({ out, err, color: false });
    log.info('loaded');
    log.success('done');
    log.print('a.aut: accept');
    log.error('failed');
    log.report('plain');
    expect(out.text()).toBe('ℹ️  loaded\n✅ done\na.aut: accept\n');
    expect(err.text()).toBe('❌ failed\nplain\n');
  });

  it('prints debug lines only when verbose', () => {
    const quietErr = sink();
    createLogger({ out: sink(), err: quietErr, color: false }).debug('hidden');
    expect(quietErr.text()).toBe('');

    const verboseErr = sink();
    createLogger({ out: sink(), err: verboseErr, color: false, verbose: true }).debug('shown');
    expect(verboseErr.text()).toBe('🐛 shown\n');
  });

  it('colors prefixes when enabled', () => {
    const out = sink();
    createLogger({ out, err: sink(), color: true }).success('done');
    // eslint-disable-next-line no-control-regex
    expect(out.text()).toMatch(/^\x1b\[32m✅\x1b\[39m done\n$/);
  });
});

describe('stripLineContinuations', () => {
  it('removes backslashes and newlines', () => {
    expect(stripLineContinuations('{"det", 1, \\\n1, [[[0]]],\n [0], [0]}')).toBe('{"det", 1, 1, [[[0]]], [0], [0]}');
  });
});
