import { expect } from 'chai';
import { describe, it, beforeEach, afterEach } from 'mocha';
import * as sinon from 'sinon';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';

import { log, setLogLevel, isLogLevelEnabled } from '../../../src/utils/logger.js';
import { mcpLogger, attachLogServer, detachLogServer } from '../../../src/utils/mcpLogger.js';

describe('logging', () => {
  let consoleError: sinon.SinonStub;
  let savedDebug: string | undefined;

  beforeEach(() => {
    savedDebug = process.env.DEBUG;
    delete process.env.DEBUG;
    setLogLevel('info');
    consoleError = sinon.stub(console, 'error');
  });

  afterEach(() => {
    sinon.restore();
    detachLogServer();
    if (savedDebug === undefined) {
      delete process.env.DEBUG;
    } else {
      process.env.DEBUG = savedDebug;
    }
    setLogLevel('info');
  });

  describe('log', () => {
    it('should prefix the level and pass extra arguments through', () => {
      const detail = { path: 'a.txt' };

      log.warn('Copy failed', detail);

      expect(consoleError.calledOnceWithExactly('[WARN] Copy failed', detail)).to.be.true;
    });

    it('should drop messages below the threshold', () => {
      setLogLevel('warn');

      log.debug('hidden');
      log.info('hidden');
      log.error('shown');

      expect(consoleError.args).to.deep.equal([['[ERROR] shown']]);
      expect(isLogLevelEnabled('info')).to.be.false;
    });

    it('should keep debug output when DEBUG is set', () => {
      process.env.DEBUG = '1';
      setLogLevel('warn');

      log.debug('details');

      expect(consoleError.args).to.deep.equal([['[DEBUG] details']]);
    });
  });

  describe('mcpLogger', () => {
    it('should fall back to stderr without a connected server', () => {
      mcpLogger.warning('sync', 'Failed to delete a.txt: EBUSY');
      mcpLogger.info('sync', { files: 2 });

      expect(consoleError.args).to.deep.equal([
        ['[WARN] [sync] Failed to delete a.txt: EBUSY'],
        ['[INFO] [sync] {"files":2}']
      ]);
    });

    it('should send logging messages through an attached server', () => {
      const server = new Server({ name: 'test', version: '0.0.0' }, { capabilities: { logging: {} } });
      const send = sinon.stub(server, 'sendLoggingMessage').resolves();
      attachLogServer(server);

      mcpLogger.info('sync', 'planned');

      expect(send.calledOnceWithExactly({ level: 'info', logger: 'sync', data: 'planned' })).to.be.true;
      expect(consoleError.called).to.be.false;
    });
  });
});
