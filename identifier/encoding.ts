/**
 * Text encodings a hash value may be written in. Each codec exposes a
 * `pattern` that recognises its canonical alphabet, plus `encode` and
 * `decode`. Decoders assume the text already matched the pattern.
 */
export type HashEncoding = "hex" | "base64" | "base32" | "base85";

export interface Codec {
  readonly encoding: HashEncoding;
  /** characters accepted when detecting this encoding */
  readonly alphabet: RegExp;
  encode(bytes: Uint8Array): string;
  decode(text: string): Uint8Array | undefined;
}

export const hex: Codec = {
  encoding: "hex",
  alphabet: /^[0-9a-fA-F]*$/,
  encode(bytes) {
    return Buffer.from(bytes).toString("hex");
  },
  decode(text) {
    if (text.length % 2 !== 0 || !hex.alphabet.test(text)) {
      return undefined;
    }
    return new Uint8Array(Buffer.from(text, "hex"));
  },
};

export const base64: Codec = {
  encoding: "base64",
  alphabet: /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/,
  encode(bytes) {
    return Buffer.from(bytes).toString("base64");
  },
  decode(text) {
    if (text.length % 4 !== 0 || !base64.alphabet.test(text)) {
      return undefined;
    }
    return new Uint8Array(Buffer.from(text, "base64"));
  },
};

const BASE32_ALPHABET = "ABCDEFGHIJKLMNOPQRSTUVWXYZ234567";

// RFC 4648 without padding
export const base32: Codec = {
  encoding: "base32",
  alphabet: /^[A-Z2-7]*$/,
  encode(bytes) {
    let out = "";
    let buffer = 0;
    let bits = 0;
    for (let byte of bytes) {
      buffer = (buffer << 8) | byte;
      bits += 8;
      while (bits >= 5) {
        out += BASE32_ALPHABET[(buffer >>> (bits - 5)) & 31];
        bits -= 5;
      }
    }
    if (bits > 0) {
      out += BASE32_ALPHABET[(buffer << (5 - bits)) & 31];
    }
    return out;
  },
  decode(text) {
    if (!base32.alphabet.test(text)) {
      return undefined;
    }
    let out: number[] = [];
    let buffer = 0;
    let bits = 0;
    for (let char of text) {
      buffer = ((buffer << 5) | BASE32_ALPHABET.indexOf(char)) & 0xffff;
      bits += 5;
      if (bits >= 8) {
        out.push((buffer >>> (bits - 8)) & 0xff);
        bits -= 8;
      }
    }
    return Uint8Array.from(out);
  },
};

const BASE85_ALPHABET =
  "0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz!#$%&()*+-;<=>?@^_`{|}~";

// RFC 1924 alphabet, big-endian 4-byte groups
export const base85: Codec = {
  encoding: "base85",
  alphabet: /^[0-9A-Za-z!#$%&()*+\-;<=>?@^_`{|}~]*$/,
  encode(bytes) {
    let padding = (4 - (bytes.length % 4)) % 4;
    let padded = new Uint8Array(bytes.length + padding);
    padded.set(bytes);
    let view = new DataView(padded.buffer);
    let out = "";
    for (let offset = 0; offset < padded.length; offset += 4) {
      let value = view.getUint32(offset);
      let chunk = "";
      for (let i = 0; i < 5; i++) {
        chunk = BASE85_ALPHABET[value % 85] + chunk;
        value = Math.floor(value / 85);
      }
      out += chunk;
    }
    return padding > 0 ? out.slice(0, out.length - padding) : out;
  },
  decode(text) {
    if (!base85.alphabet.test(text) || text.length % 5 === 1) {
      return undefined;
    }
    let padding = (5 - (text.length % 5)) % 5;
    let padded = text + "~".repeat(padding);
    let out = new Uint8Array((padded.length / 5) * 4);
    let view = new DataView(out.buffer);
    for (let offset = 0; offset < padded.length; offset += 5) {
      let value = 0;
      for (let i = 0; i < 5; i++) {
        value = value * 85 + BASE85_ALPHABET.indexOf(padded[offset + i]);
      }
      if (value > 0xffffffff) {
        return undefined;
      }
      view.setUint32((offset / 5) * 4, value);
    }
    return out.slice(0, out.length - padding);
  },
};

export const codecs: Record<HashEncoding, Codec> = {
  hex,
  base64,
  base32,
  base85,
};
