export { generateGitignore } from "./gitignore.js";
export { generateLicense } from "./license.js";
export { generateReadme } from "./readme.js";
