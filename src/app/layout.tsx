import type { Metadata } from "next";
import "./globals.css";

export const metadata: Metadata = {
  title: "CHIP-8 Emulator",
  description: "Browser-based CHIP-8 virtual machine",
};

export default function RootLayout({
  children,
}: Readonly<{
  children: React.ReactNode;
}>) {
  return (
    <html lang="en" className="dark">
      <body className="font-mono antialiased">{children}</body>
    </html>
  );
}
