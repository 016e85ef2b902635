export { classifyText, classifyLink, classifyEntry, parsePostLink } from './classifier.js';
