import { defineConfig } from "vitepress";

export default defineConfig({
	title: "gateway-guard",
	description: "Connection supervision and rate limiting for brokerage gateway sessions",
	lastUpdated: true,
	cleanUrls: true,
	themeConfig: {
		nav: [
			{ text: "Home", link: "/" },
			{ text: "Getting Started", link: "/getting-started/quick-start" },
			{ text: "Guides", link: "/guides/connection-monitor" },
		],
		sidebar: {
			"/getting-started/": [
				{
					text: "Getting Started",
					items: [
						{ text: "Quick Start", link: "/getting-started/quick-start" },
						{ text: "Configuration", link: "/getting-started/configuration" },
					],
				},
			],
			"/guides/": [
				{
					text: "Guides",
					items: [
						{ text: "Connection Monitor", link: "/guides/connection-monitor" },
						{ text: "Rate Limiter", link: "/guides/rate-limiter" },
						{ text: "Error Handling", link: "/guides/error-handling" },
					],
				},
			],
		},
		footer: {
			message: "Released under the MIT License.",
		},
		search: {
			provider: "local",
		},
	},
	markdown: {
		lineNumbers: true,
	},
});
