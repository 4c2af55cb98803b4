import type { Metadata } from "next";
import { Outfit, JetBrains_Mono } from "next/font/google";
import AppNav from "@/components/AppNav";
import "./globals.css";

const outfit = Outfit({
  subsets: ["latin"],
  variable: "--font-outfit",
  display: "swap",
});

const jetbrainsMono = JetBrains_Mono({
  subsets: ["latin"],
  variable: "--font-jetbrains-mono",
  display: "swap",
});

export const metadata: Metadata = {
  title: {
    default: "Capacity Planner",
    template: "%s | Capacity Planner",
  },
  description: "Backlog day-packing, what-if delivery estimates, production KPIs and a PDF finder",
};

export default function RootLayout({
  children,
}: Readonly<{
  children: React.ReactNode;
}>) {
  return (
    <html lang="en" className="dark">
      <body
        className={`${outfit.variable} ${jetbrainsMono.variable} antialiased bg-slate-950 text-slate-50 selection:bg-cyan-500/30`}
      >
        <AppNav />
        {children}
      </body>
    </html>
  );
}
