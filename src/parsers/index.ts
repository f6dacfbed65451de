export {
  isPlainObject,
  PassthroughParser,
  ScalarParser,
  LenientScalarParser,
  NullParser,
  passthroughParser,
  nullParser,
  scalarParsers,
  lenientScalarParsers,
} from './base';
export { ListParser, SetParser, MapParser } from './collections';
export { EnumNameParser, CaseInsensitiveEnumParser, EnumValueParser, enumMembers } from './enum';
export { DecimalParser, decimalParser } from './decimal';
export { UnionParser } from './union';
export { ModelParser } from './model';
export type { ModelParserHost } from './model';
