export {
  BaseLLMComponent,
  type BaseLLMComponentOptions,
} from './base-llm-component';
export { TextLLMComponent } from './text-llm-component';
export {
  VisionLLMComponent,
  type VisionLLMComponentOptions,
} from './vision-llm-component';
