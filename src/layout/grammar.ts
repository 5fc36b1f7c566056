/**
 * PEG grammar for segment layouts.
 * Compiled by peggy at runtime.
 */
export const LAYOUT_GRAMMAR = `
{
  function here() {
    var start = location().start;
    return { line: start.line, column: start.column };
  }
}

Layout
  = _ statements:(s:Statement _ { return s; })* { return { statements: statements }; }

Statement
  = WidthStatement
  / RepeatStatement

WidthStatement
  = "width" __ width:Integer _ ":" _ entries:EntryList?
    {
      return { kind: "width", width: width, entries: entries || [], location: here() };
    }

RepeatStatement
  = "repeat" __ pattern:BitPattern _ "x" _ count:Integer
    {
      return { kind: "repeat", pattern: pattern, count: count, location: here() };
    }

EntryList
  = head:Entry tail:(_ "," _ Entry)* { return [head].concat(tail.map(function(t) { return t[3]; })); }

Entry
  = Override
  / Range
  / Value

Override
  = "[" _ index:Integer _ "]" _ "=" _ value:Integer
    {
      return { kind: "override", index: index, value: value, location: here() };
    }

Range
  = first:Integer _ ".." _ last:Integer
    {
      return { kind: "range", first: first, last: last, location: here() };
    }

Value
  = value:Integer { return { kind: "value", value: value, location: here() }; }

BitPattern "bit pattern"
  = '"' bits:$[01]* '"' { return bits; }

Integer "integer"
  = "0x"i digits:$[0-9a-fA-F_]+ { return parseInt(digits.replace(/_/g, ""), 16); }
  / "0b"i digits:$[01_]+ { return parseInt(digits.replace(/_/g, ""), 2); }
  / digits:$([0-9] [0-9_]*) { return parseInt(digits.replace(/_/g, ""), 10); }

Comment
  = "#" [^\\n]*

__ "whitespace"
  = ([ \\t\\r\\n] / Comment)+

_ "whitespace"
  = ([ \\t\\r\\n] / Comment)*
`;
