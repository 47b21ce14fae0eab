export {
  DeclarationInputError,
  DeclarationSchema,
  loadDeclarations,
  parseDeclarations,
  readDeclarationsFile,
} from './declaration-loader';
