/**
 * PEG grammar for the TTLV text notation.
 * Compiled by peggy at runtime. Node construction is delegated to
 * `options.build(tag, body, location)` so that tag names and value ranges
 * are checked in TypeScript.
 */
export const TTLV_GRAMMAR = String.raw`
{
  function stripSpace(text) {
    return text.replace(/\s+/g, "");
  }
}

Document
  = _ node:Node _ { return node; }

Node
  = tag:TagRef _ ":" _ body:Body
    { return options.build(tag, body, location()); }

Body
  = "Structure" _ "{" _ children:NodeList _ "}"
    { return { type: "Structure", children: children }; }
  / type:ScalarType __ literal:Literal
    { return { type: type, literal: literal }; }

NodeList
  = head:Node tail:(_ node:Node { return node; })*
    { return [head].concat(tail); }
  / ""
    { return []; }

ScalarType
  = "Integer"
  / "LongInteger"
  / "BigInteger"
  / "Enumeration"
  / "Boolean"
  / "TextString"
  / "ByteString"
  / "DateTime"
  / "Interval"

TagRef
  = "0x"i digits:$[0-9a-fA-F]+
    { return { kind: "number", value: parseInt(digits, 16) }; }
  / digits:$[0-9]+
    { return { kind: "number", value: parseInt(digits, 10) }; }
  / name:$([A-Za-z_] [A-Za-z0-9_]*)
    { return { kind: "name", value: name }; }

Literal
  = StringLiteral
  / BytesLiteral
  / BooleanLiteral
  / IntegerLiteral

BooleanLiteral
  = "true" { return { kind: "boolean", value: true }; }
  / "false" { return { kind: "boolean", value: false }; }

IntegerLiteral
  = raw:$("-"? ("0x"i [0-9a-fA-F]+ / [0-9]+))
    { return { kind: "integer", text: raw }; }

BytesLiteral
  = "<" digits:$[0-9a-fA-F \t\r\n]* ">"
    { return { kind: "bytes", hex: stripSpace(digits) }; }

StringLiteral
  = '"' chars:Char* '"'
    { return { kind: "string", value: chars.join("") }; }

Char
  = [^"\\\0-\x1F]
  / "\\" seq:Escape { return seq; }

Escape
  = '"' { return '"'; }
  / "\\" { return "\\"; }
  / "/" { return "/"; }
  / "b" { return "\b"; }
  / "f" { return "\f"; }
  / "n" { return "\n"; }
  / "r" { return "\r"; }
  / "t" { return "\t"; }
  / "u" digits:$([0-9a-fA-F] [0-9a-fA-F] [0-9a-fA-F] [0-9a-fA-F])
    { return String.fromCharCode(parseInt(digits, 16)); }

_
  = (Whitespace / Comment)*

__
  = (Whitespace / Comment)+

Whitespace
  = [ \t\r\n]

Comment
  = "#" [^\n]*
`;
