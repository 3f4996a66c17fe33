import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '../../src/core/errors.js';
import {
  TelnetEngine,
  TelnetNegotiator,
  escapeIac,
  parseTelnetOptions,
  type TelnetOptions,
} from '../../src/transport/telnet.js';
import { silentLogger } from '../../src/types/logger.js';

const IAC = 255;
const SB = 250;
const SE = 240;
const WILL = 251;
const WONT = 252;
const DO = 253;
const DONT = 254;

describe('Telnet engine helpers', () => {
  describe('parseTelnetOptions', () => {
    it('should parse every supported option', () => {
      expect(parseTelnetOptions(['TTYPE=vt100', 'XDISPLOC=host:0', 'NEW_ENV=USER,ada', 'NEW_ENV=LANG,C,UTF-8'])).toEqual({
        terminalType: 'vt100',
        displayLocation: 'host:0',
        environment: [['USER', 'ada'], ['LANG', 'C,UTF-8']],
      });
    });

    it('should reject unknown options', () => {
      expect(() => parseTelnetOptions(['BAUD=9600'])).toThrow('Unknown telnet option BAUD=9600');
    });

    it('should reject NEW_ENV without a value', () => {
      expect(() => parseTelnetOptions(['NEW_ENV=USER'])).toThrow(ConfigurationError);
    });
  });

  describe('escapeIac', () => {
    it('should double IAC bytes', () => {
      expect([...escapeIac(Buffer.from([1, IAC, 2]))]).toEqual([1, IAC, IAC, 2]);
    });

    it('should return plain data untouched', () => {
      const data = Buffer.from('plain');
      expect(escapeIac(data)).toBe(data);
    });
  });

  describe('TelnetNegotiator', () => {
    const options: TelnetOptions = { terminalType: 'xterm', environment: [['USER', 'ada']] };

    it('should agree to requested options it has values for', () => {
      const negotiator = new TelnetNegotiator(options);

      expect(negotiator.process(Buffer.from([IAC, DO, 24])).replies).toEqual([Buffer.from([IAC, WILL, 24])]);
      expect(negotiator.process(Buffer.from([IAC, DO, 35])).replies).toEqual([Buffer.from([IAC, WONT, 35])]);
      expect(negotiator.process(Buffer.from([IAC, DO, 39])).replies).toEqual([Buffer.from([IAC, WILL, 39])]);
    });

    it('should not answer a repeated request twice', () => {
      const negotiator = new TelnetNegotiator(options);
      negotiator.process(Buffer.from([IAC, DO, 24]));
      expect(negotiator.process(Buffer.from([IAC, DO, 24])).replies).toEqual([]);
    });

    it('should accept echo from the server and refuse the rest', () => {
      const negotiator = new TelnetNegotiator({ environment: [] });

      expect(negotiator.process(Buffer.from([IAC, WILL, 1])).replies).toEqual([Buffer.from([IAC, DO, 1])]);
      expect(negotiator.process(Buffer.from([IAC, WILL, 5])).replies).toEqual([Buffer.from([IAC, DONT, 5])]);
      expect(negotiator.process(Buffer.from([IAC, WONT, 1])).replies).toEqual([Buffer.from([IAC, DONT, 1])]);
    });

    it('should answer terminal type and environment subnegotiation', () => {
      const negotiator = new TelnetNegotiator(options);

      expect(negotiator.process(Buffer.from([IAC, SB, 24, 1, IAC, SE])).replies).toEqual([
        Buffer.concat([Buffer.from([IAC, SB, 24, 0]), Buffer.from('xterm'), Buffer.from([IAC, SE])]),
      ]);
      expect(negotiator.process(Buffer.from([IAC, SB, 39, 1, IAC, SE])).replies).toEqual([
        Buffer.concat([
          Buffer.from([IAC, SB, 39, 0, 0]),
          Buffer.from('USER'),
          Buffer.from([1]),
          Buffer.from('ada'),
          Buffer.from([IAC, SE]),
        ]),
      ]);
    });

    it('should separate text from commands and unescape IAC', () => {
      const negotiator = new TelnetNegotiator({ environment: [] });
      const result = negotiator.process(
        Buffer.concat([Buffer.from('hi'), Buffer.from([IAC, DO, 3]), Buffer.from('there'), Buffer.from([IAC, IAC])])
      );

      expect(result.text).toEqual(Buffer.concat([Buffer.from('hithere'), Buffer.from([IAC])]));
      expect(result.replies).toEqual([Buffer.from([IAC, WILL, 3])]);
    });

    it('should hold incomplete sequences until the rest arrives', () => {
      const negotiator = new TelnetNegotiator(options);

      expect(negotiator.process(Buffer.from([IAC])).replies).toEqual([]);
      expect(negotiator.process(Buffer.from([DO, 24])).replies).toEqual([Buffer.from([IAC, WILL, 24])]);
    });
  });

  describe('TelnetEngine.prepare', () => {
    const engine = new TelnetEngine({ idleTimeout: 100, logger: silentLogger });
    const base = { commands: [], options: { environment: [] }, timeout: 1000 };

    it('should default to port 23', () => {
      expect(engine.prepare({ ...base, url: 'telnet://router.local' })).toMatchObject({
        host: 'router.local',
        port: 23,
      });
    });

    it('should parse SOCKS proxies', () => {
      const prepared = engine.prepare({ ...base, url: 'telnet://router.local:2323', proxy: 'socks5://127.0.0.1:1080' });
      expect(prepared.port).toBe(2323);
      expect(prepared.socks).toEqual({ host: '127.0.0.1', port: 1080, type: 5, remoteDns: false, userId: undefined, password: undefined });
    });

    it('should reject other schemes and HTTP proxies', () => {
      expect(() => engine.prepare({ ...base, url: 'ssh://router.local' })).toThrow(ConfigurationError);
      expect(() => engine.prepare({ ...base, url: 'telnet://router.local', proxy: 'http://proxy:3128' })).toThrow(
        'Unsupported proxy for telnet: http://proxy:3128'
      );
    });
  });
});
