import crypto from 'crypto';
import sax from 'sax';
import type { QualifiedAttribute, QualifiedTag, SAXParser, Tag } from 'sax';
import type { ChannelIconMap, IconResolver, RewriteResult } from './types';

export const XML_DECLARATION = "<?xml version='1.0' encoding='UTF-8'?>";
export const XMLTV_DOCTYPE = '<!DOCTYPE tv SYSTEM "https://iptvx.one/xmltv.dtd">';

type Attributes = Record<string, string>;

function createParser(): SAXParser {
  const parser = sax.parser(true, { trim: false, normalize: false });
  parser.onerror = (e: Error) => { throw e; };
  return parser;
}

function attributesOf(node: Tag | QualifiedTag): Attributes {
  const out: Attributes = {};
  const raw: Record<string, string | QualifiedAttribute> = node.attributes;
  for (const [k, v] of Object.entries(raw)) {
    out[k] = typeof v === 'string' ? v : v.value;
  }
  return out;
}

export function collectIconUrls(xml: string): Set<string> {
  const urls = new Set<string>();
  const parser = createParser();
  parser.onopentag = (node: Tag | QualifiedTag) => {
    if (node.name !== 'icon') return;
    const src = attributesOf(node).src;
    if (src) urls.add(src);
  };
  parser.write(xml).close();
  return urls;
}

// sha256 over the sorted icon urls; null when the document carries no icons
export function iconSignature(xml: string): string | null {
  const urls = collectIconUrls(xml);
  if (!urls.size) return null;
  const sorted = Array.from(urls).sort();
  return crypto.createHash('sha256').update(sorted.join(''), 'utf8').digest('hex');
}

export function extractChannelIcons(xml: string): ChannelIconMap {
  const map: ChannelIconMap = {};
  const parser = createParser();
  // channel frames currently open: id plus whether the first <icon> child was seen
  const stack: Array<{ name: string; id?: string; iconSeen: boolean }> = [];
  parser.onopentag = (node: Tag | QualifiedTag) => {
    const parent = stack[stack.length - 1];
    const attrs = attributesOf(node);
    if (node.name === 'icon' && parent && parent.name === 'channel' && !parent.iconSeen) {
      parent.iconSeen = true;
      if (parent.id && attrs.src) map[parent.id] = attrs.src;
    }
    stack.push({ name: node.name, id: node.name === 'channel' ? attrs.id : undefined, iconSeen: false });
  };
  parser.onclosetag = () => { stack.pop(); };
  parser.write(xml).close();
  return map;
}

export function escapeText(s: string): string {
  return s.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

export function escapeAttr(s: string): string {
  return escapeText(s)
    .replace(/"/g, '&quot;')
    .replace(/\n/g, '&#10;')
    .replace(/\r/g, '&#13;')
    .replace(/\t/g, '&#9;');
}

function openTag(name: string, attrs: Attributes): string {
  let out = `<${name}`;
  for (const [k, v] of Object.entries(attrs)) out += ` ${k}="${escapeAttr(v)}"`;
  return out;
}

type Frame = {
  name: string;
  pending: boolean; // start tag written without its closing '>'
  hasChild: boolean;
  hasText: boolean;
  // set on top-level <channel> frames only
  target?: string;
  iconSeen?: boolean;
};

/**
 * Re-serializes an XMLTV document, pointing each top-level <channel>'s first <icon> at
 * whatever `resolve` returns for its id. Channels without an <icon> get one appended.
 *
 * Whitespace-only text is dropped and the tree is re-indented with two spaces; the XML
 * declaration and doctype are always rewritten to the XMLTV ones.
 */
export function rewriteChannelIcons(xml: string, resolve: IconResolver): RewriteResult {
  const out: string[] = [XML_DECLARATION, '\n', XMLTV_DOCTYPE, '\n'];
  const stack: Frame[] = [];
  let changes = 0;

  const indent = (depth: number) => '  '.repeat(depth);

  // make room for a child node (element or comment) inside the current frame
  const beginChild = () => {
    const parent = stack[stack.length - 1];
    if (!parent) return;
    if (parent.pending) { out.push('>'); parent.pending = false; }
    parent.hasChild = true;
    if (!parent.hasText) out.push('\n', indent(stack.length));
  };

  const writeText = (t: string) => {
    if (!t.trim()) return;
    const frame = stack[stack.length - 1];
    if (!frame) return;
    if (frame.pending) { out.push('>'); frame.pending = false; }
    frame.hasText = true;
    out.push(escapeText(t));
  };

  const parser = createParser();

  parser.onopentag = (node: Tag | QualifiedTag) => {
    const parent = stack[stack.length - 1];
    const attrs = attributesOf(node);
    const frame: Frame = { name: node.name, pending: true, hasChild: false, hasText: false };

    if (node.name === 'channel' && stack.length === 1) {
      frame.iconSeen = false;
      frame.target = attrs.id ? resolve(attrs.id) : undefined;
    } else if (node.name === 'icon' && parent && parent.iconSeen === false) {
      parent.iconSeen = true;
      if (parent.target !== undefined && attrs.src !== parent.target) {
        attrs.src = parent.target;
        changes++;
      }
    }

    beginChild();
    out.push(openTag(node.name, attrs));
    stack.push(frame);
  };

  parser.ontext = writeText;
  parser.oncdata = writeText;

  parser.oncomment = (comment: string) => {
    beginChild();
    out.push(`<!--${comment}-->`);
    if (!stack.length) out.push('\n');
  };

  parser.onprocessinginstruction = (pi: { name: string; body: string }) => {
    if (pi.name.toLowerCase() === 'xml') return;
    beginChild();
    out.push(`<?${pi.name}${pi.body ? ' ' + pi.body : ''}?>`);
    if (!stack.length) out.push('\n');
  };

  parser.onclosetag = (name: string) => {
    const frame = stack[stack.length - 1];
    if (!frame) return;
    if (frame.iconSeen === false && frame.target !== undefined) {
      frame.iconSeen = true;
      beginChild();
      out.push(openTag('icon', { src: frame.target }), '/>');
      changes++;
    }
    stack.pop();
    if (frame.pending) {
      out.push('/>');
    } else {
      if (frame.hasChild && !frame.hasText) out.push('\n', indent(stack.length));
      out.push(`</${name}>`);
    }
    if (!stack.length) out.push('\n');
  };

  parser.write(xml).close();
  return { xml: out.join(''), changes };
}
