export function generateGitignore(): string {
	return `# Vagrant
.vagrant/
*.box

# Disk images (keep the directory)
images/*
!images/.gitkeep

# Logs
*.log
ubuntu-*-cloudimg-console.log

# IDE
.idea/
.vscode/
*.swp
*.swo

# OS
.DS_Store
Thumbs.db
`;
}
