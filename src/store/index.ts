export { TemplateRegistry, TemplateStore, createTemplateStore } from './template-store.js';
