/**
 * Email Signer Service
 *
 * OpenPGP signing and encryption of composed messages (PGP/MIME, RFC 3156).
 *
 * - Signing wraps the body in `multipart/signed` with a detached signature
 * - Encryption wraps it in `multipart/encrypted`, encrypted to every
 *   recipient and the sender; with signing on, one pass signs and encrypts
 *
 * The signing key is the armored key file from configuration, or, when none
 * is set, the private key in the keyring directory that belongs to the sender.
 *
 * @module services/email/emailSigner
 */

import * as fs from 'fs';
import * as path from 'path';
import * as openpgp from 'openpgp';
import MimeNode from 'nodemailer/lib/mime-node';
import { signerLogger } from '../../utils/logger';
import { formatAddress } from './addressParser';
import type { ComposedEmail } from './emailComposer';
import type { OutgoingMessage } from './emailSender';
import { MissingEncryptionKeyError, MissingSigningKeyError } from './errors';

// ========================================
// TYPES
// ========================================

export interface PgpSettings {
  sign: boolean;
  encrypt: boolean;
  /** Armored private key file used for signing. */
  keyFile?: string;
  passphrase?: string;
  /** Directory of armored `*.asc` key files. */
  keyringDir?: string;
}

export interface EmailSigner {
  prepare(email: ComposedEmail): Promise<OutgoingMessage>;
}

// ========================================
// KEYRING
// ========================================

const HASH_NAMES: Partial<Record<openpgp.enums.hash, string>> = {
  [openpgp.enums.hash.sha1]: 'sha1',
  [openpgp.enums.hash.sha224]: 'sha224',
  [openpgp.enums.hash.sha256]: 'sha256',
  [openpgp.enums.hash.sha384]: 'sha384',
  [openpgp.enums.hash.sha512]: 'sha512',
};

function userIdAddress(userId: string): string {
  const match = /<([^>]+)>/.exec(userId);
  return (match ? match[1] : userId).trim().toLowerCase();
}

function belongsTo(key: openpgp.Key, address: string): boolean {
  const wanted = address.toLowerCase();
  return key.getUserIDs().some((userId) => userIdAddress(userId) === wanted);
}

export async function readKeyring(directory: string): Promise<openpgp.Key[]> {
  const files = fs
    .readdirSync(directory)
    .filter((file) => file.endsWith('.asc'))
    .sort();

  const keys: openpgp.Key[] = [];
  for (const file of files) {
    const armoredKeys = fs.readFileSync(path.join(directory, file), 'utf-8');
    keys.push(...(await openpgp.readKeys({ armoredKeys })));
  }

  signerLogger.debug('Loaded keyring', { directory, files: files.length, keys: keys.length });
  return keys;
}

async function unlock(
  privateKey: openpgp.PrivateKey,
  passphrase: string | undefined
): Promise<openpgp.PrivateKey> {
  if (privateKey.isDecrypted()) return privateKey;
  return openpgp.decryptKey({ privateKey, passphrase });
}

// ========================================
// MIME HELPERS
// ========================================

function buildNode(node: MimeNode): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    node.build((error, message) => (error ? reject(error) : resolve(message)));
  });
}

function appendBody(parent: MimeNode, email: ComposedEmail): MimeNode {
  if (!email.html) {
    return parent.createChild('text/plain; charset=utf-8').setContent(email.text);
  }
  const alternative = parent.createChild('multipart/alternative');
  alternative.createChild('text/plain; charset=utf-8').setContent(email.text);
  alternative.createChild('text/html; charset=utf-8').setContent(email.html);
  return alternative;
}

function setEnvelopeHeaders(root: MimeNode, email: ComposedEmail): void {
  root.setHeader('From', formatAddress(email.from));
  root.setHeader('To', email.to.map(formatAddress).join(', '));
  root.setHeader('Subject', email.subject);
}

// ========================================
// PGP SIGNER
// ========================================

export class PgpEmailSigner implements EmailSigner {
  private keyring: Promise<openpgp.Key[]> | undefined;
  private fileSigningKey: Promise<openpgp.PrivateKey> | undefined;

  constructor(private readonly settings: PgpSettings) {}

  async prepare(email: ComposedEmail): Promise<OutgoingMessage> {
    if (!this.settings.sign && !this.settings.encrypt) {
      return { email };
    }

    const signingKey = this.settings.sign ? await this.signingKey(email.from.address) : undefined;

    const raw = this.settings.encrypt
      ? await this.encrypt(email, signingKey)
      : await this.sign(email, signingKey);

    signerLogger.debug('Protected message', {
      signed: Boolean(signingKey),
      encrypted: this.settings.encrypt,
      bytes: raw.length,
    });
    return { email, raw };
  }

  private loadKeyring(): Promise<openpgp.Key[]> {
    if (!this.settings.keyringDir) return Promise.resolve([]);
    this.keyring ??= readKeyring(this.settings.keyringDir);
    return this.keyring;
  }

  private async signingKey(sender: string): Promise<openpgp.PrivateKey> {
    const { keyFile, passphrase } = this.settings;

    if (keyFile) {
      this.fileSigningKey ??= openpgp
        .readPrivateKey({ armoredKey: fs.readFileSync(keyFile, 'utf-8') })
        .then((key) => unlock(key, passphrase));
      return this.fileSigningKey;
    }

    const key = (await this.loadKeyring()).find(
      (candidate) => candidate.isPrivate() && belongsTo(candidate, sender)
    );
    if (!key || !key.isPrivate()) {
      throw new MissingSigningKeyError();
    }
    return unlock(key, passphrase);
  }

  private async encryptionKeys(email: ComposedEmail): Promise<openpgp.PublicKey[]> {
    const keyring = await this.loadKeyring();
    const addresses = [...email.to.map((recipient) => recipient.address), email.from.address];

    const keys: openpgp.PublicKey[] = [];
    for (const address of addresses) {
      const key = keyring.find((candidate) => belongsTo(candidate, address));
      if (!key) {
        throw new MissingEncryptionKeyError(address);
      }
      keys.push(key.toPublic());
    }
    return keys;
  }

  private async sign(email: ComposedEmail, signingKey: openpgp.PrivateKey | undefined): Promise<Buffer> {
    if (!signingKey) {
      throw new MissingSigningKeyError();
    }

    const root = new MimeNode('multipart/signed; protocol="application/pgp-signature"');
    setEnvelopeHeaders(root, email);
    const body = appendBody(root, email);

    const message: openpgp.Message<string> = await openpgp.createMessage({
      text: (await buildNode(body)).toString('utf-8'),
    });
    const armoredSignature = await openpgp.sign({
      message,
      signingKeys: signingKey,
      detached: true,
      format: 'armored',
    });

    const [packet] = (await openpgp.readSignature({ armoredSignature })).packets;
    const hashName = (packet?.hashAlgorithm && HASH_NAMES[packet.hashAlgorithm]) || 'sha256';
    root.setHeader(
      'Content-Type',
      `multipart/signed; micalg=pgp-${hashName}; protocol="application/pgp-signature"`
    );

    root
      .createChild('application/pgp-signature; name="signature.asc"')
      .setHeader('Content-Description', 'OpenPGP digital signature')
      .setHeader('Content-Transfer-Encoding', '7bit')
      .setContent(armoredSignature);

    return buildNode(root);
  }

  private async encrypt(email: ComposedEmail, signingKey: openpgp.PrivateKey | undefined): Promise<Buffer> {
    const encryptionKeys = await this.encryptionKeys(email);

    // Child of a throwaway root, so the entity carries no top-level headers.
    const body = appendBody(new MimeNode('multipart/mixed'), email);
    const message: openpgp.Message<string> = await openpgp.createMessage({
      text: (await buildNode(body)).toString('utf-8'),
    });

    const encrypted = await openpgp.encrypt({
      message,
      encryptionKeys,
      signingKeys: signingKey,
      format: 'armored',
    });

    const root = new MimeNode('multipart/encrypted; protocol="application/pgp-encrypted"');
    setEnvelopeHeaders(root, email);
    root
      .createChild('application/pgp-encrypted')
      .setHeader('Content-Description', 'PGP/MIME version identification')
      .setHeader('Content-Transfer-Encoding', '7bit')
      .setContent('Version: 1\r\n');
    root
      .createChild('application/octet-stream; name="encrypted.asc"')
      .setHeader('Content-Description', 'OpenPGP encrypted message')
      .setHeader('Content-Disposition', 'inline; filename="encrypted.asc"')
      .setHeader('Content-Transfer-Encoding', '7bit')
      .setContent(encrypted);

    return buildNode(root);
  }
}

/**
 * A signer that leaves messages untouched when neither signing nor
 * encryption is requested.
 */
export function createEmailSigner(settings: PgpSettings): EmailSigner {
  return new PgpEmailSigner(settings);
}
