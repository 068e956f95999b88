export { scanTemplate, listTokenNames, sameSyntax, DEFAULT_TOKEN_SYNTAX } from './token-scanner.js';
