import crypto from 'node:crypto';
import net from 'node:net';
import pino from 'pino';
import type { Logger } from '../../src/logger.js';

export async function pickFreeTcpPort(): Promise<number> {
  return await new Promise((resolve, reject) => {
    const s = net.createServer();
    s.once('error', reject);
    s.listen(0, '127.0.0.1', () => {
      const addr = s.address();
      const port = typeof addr === 'object' && addr ? addr.port : 0;
      s.close((err) => (err ? reject(err) : resolve(port)));
    });
  });
}

export type LogLine = { level: number; msg: string; [key: string]: unknown };

/** pino logger writing JSON lines into memory. */
export function captureLogger(): { logger: Logger; lines: LogLine[] } {
  const lines: LogLine[] = [];
  const logger = pino(
    { level: 'debug' },
    {
      write(chunk: string) {
        lines.push(JSON.parse(chunk));
      }
    }
  );
  return { logger, lines };
}

// Word framing for the stand-in device; test sentences never exceed the two-byte length form.
function encodeSentence(words: string[]): Buffer {
  const parts: Buffer[] = [];
  for (const word of [...words, '']) {
    const body = Buffer.from(word, 'utf8');
    if (body.length < 0x80) parts.push(Buffer.from([body.length]));
    else if (body.length < 0x4000) parts.push(Buffer.from([((body.length >> 8) & 0x3f) | 0x80, body.length & 0xff]));
    else throw new Error(`word too long for the stand-in device: ${body.length}`);
    parts.push(body);
  }
  return Buffer.concat(parts);
}

function createSentenceReader(): (chunk: Buffer) => string[][] {
  let buffered = Buffer.alloc(0);
  let words: string[] = [];
  return (chunk) => {
    buffered = Buffer.concat([buffered, chunk]);
    const sentences: string[][] = [];
    for (;;) {
      if (buffered.length < 1) break;
      const first = buffered[0];
      const twoBytes = (first & 0x80) !== 0;
      if (twoBytes && buffered.length < 2) break;
      const len = twoBytes ? ((first & 0x3f) << 8) | buffered[1] : first;
      const header = twoBytes ? 2 : 1;
      if (buffered.length < header + len) break;
      const word = buffered.subarray(header, header + len).toString('utf8');
      buffered = buffered.subarray(header + len);
      if (word === '') {
        sentences.push(words);
        words = [];
      } else {
        words.push(word);
      }
    }
    return sentences;
  };
}

export type FakeRouterOsOptions = {
  user?: string;
  password?: string;
  /** Pre-6.43 behaviour: answer the password login with an MD5 challenge. */
  legacyLogin?: boolean;
  challenge?: string;
  staticNames?: string[];
  cache?: { name: string; type: string }[];
  /** `/ip/dns/static/add` traps for these names. */
  rejectNames?: string[];
};

export type FakeRouterOs = {
  port: number;
  added: Record<string, string>[];
  flushes: number;
  commands: string[];
  close: () => Promise<void>;
};

function attributesOf(words: string[]): Record<string, string> {
  const attrs: Record<string, string> = {};
  for (const w of words) {
    if (!w.startsWith('=')) continue;
    const eq = w.indexOf('=', 1);
    attrs[w.slice(1, eq)] = w.slice(eq + 1);
  }
  return attrs;
}

/** Minimal RouterOS API endpoint over plain TCP on 127.0.0.1; replies echo the command's `.tag`. */
export async function startFakeRouterOs(opts: FakeRouterOsOptions = {}): Promise<FakeRouterOs> {
  const user = opts.user ?? 'admin';
  const password = opts.password ?? 'test-secret';
  const challenge = opts.challenge ?? '0123456789abcdef0123456789abcdef';
  const sockets = new Set<net.Socket>();

  const state: FakeRouterOs = {
    port: 0,
    added: [],
    flushes: 0,
    commands: [],
    close: async () => {
      for (const s of sockets) s.destroy();
      await new Promise<void>((resolve) => server.close(() => resolve()));
    }
  };

  const handle = (words: string[], authed: boolean): { replies: string[][]; authed: boolean; quit?: boolean } => {
    const [command = ''] = words;
    const attrs = attributesOf(words);
    const done = [['!done']];
    const trap = (message: string) => ({ replies: [['!trap', `=message=${message}`], ['!done']], authed });
    state.commands.push(command);

    if (command === '/login') {
      if ('response' in attrs) {
        const expected =
          '00' +
          crypto
            .createHash('md5')
            .update(Buffer.concat([Buffer.from([0]), Buffer.from(password), Buffer.from(challenge, 'hex')]))
            .digest('hex');
        if (attrs.name === user && attrs.response === expected) return { replies: done, authed: true };
        return trap('invalid user name or password (6)');
      }
      if (opts.legacyLogin) return { replies: [['!done', `=ret=${challenge}`]], authed };
      if (attrs.name === user && attrs.password === password) return { replies: done, authed: true };
      return trap('invalid user name or password (6)');
    }

    if (command === '/quit') return { replies: [['!fatal', 'session terminated on request']], authed, quit: true };

    if (!authed) return trap('not logged in');

    switch (command) {
      case '/ip/dns/static/print':
        return {
          replies: [
            ...(opts.staticNames ?? []).map((n, i) => ['!re', `=.id=*${i + 1}`, `=name=${n}`]),
            ['!re', '=.id=*ff', '=regexp=.*\\.lan'],
            ['!done']
          ],
          authed
        };
      case '/ip/dns/cache/all/print': {
        const filtered = words.includes('?type=A') && words.includes('?type=CNAME');
        const rows = (opts.cache ?? []).filter((r) => !filtered || r.type === 'A' || r.type === 'CNAME');
        return { replies: [...rows.map((r) => ['!re', `=name=${r.name}`]), ['!done']], authed };
      }
      case '/ip/dns/static/add':
        if ((opts.rejectNames ?? []).includes(attrs.name ?? '')) return trap('failure: entry already exists');
        state.added.push(attrs);
        return { replies: done, authed };
      case '/ip/dns/cache/flush':
        state.flushes++;
        return { replies: done, authed };
      case '/system/hang':
        return { replies: [], authed };
      default:
        return trap('no such command');
    }
  };

  const server = net.createServer((socket) => {
    sockets.add(socket);
    socket.on('close', () => sockets.delete(socket));
    const read = createSentenceReader();
    let authed = false;
    socket.on('error', () => socket.destroy());
    socket.on('data', (chunk: Buffer) => {
      for (const words of read(chunk)) {
        const res = handle(words, authed);
        authed = res.authed;
        const tag = words.find((w) => w.startsWith('.tag='));
        for (const reply of res.replies) socket.write(encodeSentence(tag ? [...reply, tag] : reply));
        if (res.quit) socket.end();
      }
    });
  });

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(0, '127.0.0.1', () => resolve());
  });
  const addr = server.address();
  state.port = typeof addr === 'object' && addr ? addr.port : 0;
  return state;
}
